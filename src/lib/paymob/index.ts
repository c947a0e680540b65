export * from './errors';
export * from './config';
export * from './tokenManager';
export * from './transactions';
export * from './context';
