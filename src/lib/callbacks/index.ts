export * from './types';
export * from './classifier';
export * from './canonicalizer';
export * from './authenticator';
export * from './request';
