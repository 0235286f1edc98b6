/**
 * Cloud classification by resource identifier shape.
 */

import { CloudProvider } from '../types.js';

const AWS_PATTERNS: readonly RegExp[] = [/^arn:aws(-[a-z]+)*:/i, /^s3:\/\//i];

const AZURE_PATTERNS: readonly RegExp[] = [
  /^\/subscriptions\//i,
  /\.azure\.com(\/|:|$)/i,
  /\.windows\.net(\/|:|$)/i,
];

const GCP_PATTERNS: readonly RegExp[] = [/^projects\//i, /^\/\/[a-z0-9.-]+\.googleapis\.com\//i, /^gs:\/\//i];

/**
 * Maximal alphanumeric runs, lower-cased.
 */
export function tokenize(resource: string): string[] {
  return resource
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((token) => token.length > 0);
}

/**
 * Attribute a resource to a cloud. Structural prefixes are checked first
 * (AWS, Azure, GCP), then whole `aws` / `azure` tokens. Anything else is GCP.
 */
export function classifyResource(resource: string): CloudProvider {
  const value = resource.trim();

  if (AWS_PATTERNS.some((pattern) => pattern.test(value))) return CloudProvider.AWS;
  if (AZURE_PATTERNS.some((pattern) => pattern.test(value))) return CloudProvider.AZURE;
  if (GCP_PATTERNS.some((pattern) => pattern.test(value))) return CloudProvider.GCP;

  const tokens = tokenize(value);
  if (tokens.includes('aws')) return CloudProvider.AWS;
  if (tokens.includes('azure')) return CloudProvider.AZURE;

  return CloudProvider.GCP;
}
