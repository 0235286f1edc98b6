/**
 * Policy Store
 *
 * Holds the active policy snapshot. Reloads parse the whole document first and
 * then swap the reference, so concurrent readers see either the old snapshot
 * or the new one, never a mix.
 *
 * Events:
 * - `loaded` (snapshot: PolicySnapshot) after every successful load or reload
 * - `reloadFailed` (error: ConfigError, retained: PolicySnapshot) when a reload
 *   fails and the last-known-good snapshot stays active
 */

import { EventEmitter } from 'node:events';
import { ConfigError } from '../errors.js';
import type { PolicySnapshot } from '../types.js';
import { loadPolicyFromFile } from './loader.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('policy-store');

/**
 * Result of a reload attempt.
 */
export interface PolicyReloadResult {
  /** Whether the new document replaced the active snapshot */
  reloaded: boolean;
  /** The snapshot active after the attempt */
  snapshot: PolicySnapshot;
  /** Why the reload was rejected */
  error?: ConfigError;
}

export class PolicyStore extends EventEmitter {
  private active: PolicySnapshot | null = null;
  private readonly path: string | null;

  constructor(path: string | null = null) {
    super();
    this.path = path;
  }

  /**
   * Initial load. A missing or invalid document is fatal: the pipeline must
   * not serve requests without a policy.
   *
   * @throws ConfigError
   */
  async load(): Promise<PolicySnapshot> {
    const path = this.requirePath();
    const snapshot = await loadPolicyFromFile(path);
    this.swap(snapshot);
    return snapshot;
  }

  /**
   * Re-read the document. On failure the previous snapshot stays active and a
   * warning is logged; the store never falls back to permissive defaults.
   */
  async reload(): Promise<PolicyReloadResult> {
    const path = this.requirePath();
    const previous = this.active;

    if (!previous) {
      const snapshot = await this.load();
      return { reloaded: true, snapshot };
    }

    try {
      const snapshot = await loadPolicyFromFile(path);
      this.swap(snapshot);
      return { reloaded: true, snapshot };
    } catch (error) {
      const configError =
        error instanceof ConfigError
          ? error
          : new ConfigError(path, error instanceof Error ? error.message : String(error));
      log.warn(
        { path, err: configError, retainedHash: previous.hash },
        'Policy reload failed, keeping last-known-good policy'
      );
      this.emit('reloadFailed', configError, previous);
      return { reloaded: false, snapshot: previous, error: configError };
    }
  }

  /**
   * Install an already-built snapshot (inline documents, tests).
   */
  use(snapshot: PolicySnapshot): void {
    this.swap(snapshot);
  }

  /**
   * The active snapshot.
   *
   * @throws ConfigError if nothing has been loaded yet
   */
  current(): PolicySnapshot {
    if (!this.active) {
      throw new ConfigError(this.path ?? 'inline', 'no policy has been loaded');
    }
    return this.active;
  }

  isLoaded(): boolean {
    return this.active !== null;
  }

  get sourcePath(): string | null {
    return this.path;
  }

  private swap(snapshot: PolicySnapshot): void {
    this.active = snapshot;
    log.info(
      {
        source: snapshot.source,
        name: snapshot.name,
        version: snapshot.version,
        policies: snapshot.policySet.policies.length,
        hash: snapshot.hash,
      },
      'Policy snapshot activated'
    );
    this.emit('loaded', snapshot);
  }

  private requirePath(): string {
    if (!this.path) {
      throw new ConfigError('inline', 'policy store has no document path to load from');
    }
    return this.path;
  }
}
