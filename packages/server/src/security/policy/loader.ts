/**
 * Access Control Pipeline - Policy Loader
 *
 * Functions for loading policy documents from YAML or JSON files.
 */

import { readFile } from 'node:fs/promises';
import { createHash } from 'node:crypto';
import YAML from 'yaml';
import { ConfigError } from '../errors.js';
import {
  normalizePolicyDocument,
  policyDocumentSchema,
  type PolicyDocument,
} from '../schemas.js';
import type { PolicySnapshot } from '../types.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('policy-loader');

/**
 * Compute a SHA-256 hash of a parsed policy document for audit comparison.
 * Schema output has a fixed key order, so the serialization is stable.
 */
export function computePolicyHash(document: PolicyDocument): string {
  return createHash('sha256').update(JSON.stringify(document)).digest('hex');
}

/**
 * Validate a raw (already parsed) document and build a snapshot from it.
 *
 * @param raw - Parsed YAML/JSON value
 * @param source - File path or 'inline', used in errors and audit events
 * @throws ConfigError if validation fails
 */
export function buildPolicySnapshot(raw: unknown, source = 'inline'): PolicySnapshot {
  if (raw === null || raw === undefined) {
    throw new ConfigError(source, 'document is empty');
  }

  const result = policyDocumentSchema.safeParse(normalizePolicyDocument(raw));

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigError(source, errors.join(', '), errors);
  }

  const document = result.data;

  return {
    name: document.name,
    version: document.version,
    policySet: {
      defaultDecision: document.defaultDecision,
      policies: document.policies.map((p, index) => ({
        id: p.id ?? `policy-${index + 1}`,
        matchActions: [...p.matchActions],
        decision: p.decision,
        description: p.description,
      })),
    },
    trust: {
      trustedNetworkPrefixes: [...document.context.trustedNetworkPrefixes],
      trustedDevices: [...document.context.trustedDevices],
      businessHours: { ...document.context.businessHours },
    },
    source,
    hash: computePolicyHash(document),
    loadedAt: new Date(),
  };
}

/**
 * Parse a policy document from YAML (or JSON, which YAML accepts).
 *
 * @throws ConfigError if the text cannot be parsed or validated
 */
export function parsePolicyDocument(text: string, source = 'inline'): PolicySnapshot {
  let parsed: unknown;
  try {
    parsed = YAML.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(source, `could not parse document: ${message}`, [], { cause: error });
  }
  return buildPolicySnapshot(parsed, source);
}

/**
 * Load and validate a policy document from disk.
 *
 * @param filePath - Path to the YAML or JSON file
 * @throws ConfigError if the file is missing, unreadable or invalid
 */
export async function loadPolicyFromFile(filePath: string): Promise<PolicySnapshot> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(filePath, `could not read file: ${message}`, [], { cause: error });
  }

  const snapshot = parsePolicyDocument(content, filePath);
  logger.debug(
    { filePath, policies: snapshot.policySet.policies.length, hash: snapshot.hash },
    'Parsed policy document'
  );
  return snapshot;
}
