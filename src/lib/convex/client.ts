import { ConvexHttpClient } from 'convex/browser';

export interface ConvexClientConfig {
  baseUrl: string;
  authToken?: string;
}

function canonicaliseDeploymentUrl(url: string): string {
  const trimmed = url.trim();
  try {
    const parsed = new URL(trimmed);
    if (parsed.hostname.endsWith('.convex.site')) {
      parsed.hostname = parsed.hostname.replace(/\.convex\.site$/, '.convex.cloud');
    }
    return parsed.toString();
  } catch {
    if (trimmed.endsWith('.convex.site')) {
      return trimmed.replace(/\.convex\.site(?=[/?#]|$)/, '.convex.cloud');
    }
    return trimmed;
  }
}

export function normaliseBaseUrl(url: string): string {
  return canonicaliseDeploymentUrl(url).replace(/\/+$/, '');
}

export function buildConvexHttpClient(config: ConvexClientConfig): ConvexHttpClient {
  const client = new ConvexHttpClient(normaliseBaseUrl(config.baseUrl), {
    skipConvexDeploymentUrlCheck: true,
  });

  const authToken = config.authToken?.trim();
  if (authToken) {
    client.setAuth(authToken);
  }

  return client;
}
