/**
 * Central Monitoring storage.
 * The audit log is a JSON-lines file, one entry per line, only ever appended.
 * Metrics are a JSON side file replaced with write-to-temp + rename.
 */

import { appendFile, mkdir, open, readFile, rename, writeFile, type FileHandle } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import {
  eventLogEntrySchema,
  metricsStateSchema,
  type EventLogEntry,
  type MetricsState,
} from '@ztgate/shared';
import type { EventLogReadResult, EventSink, MetricsStore } from './types.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('monitoring-storage');

export const EVENT_LOG_FILENAME = 'events.jsonl';
export const METRICS_FILENAME = 'metrics.json';

export function getEventLogPath(dataDir: string): string {
  return join(dataDir, EVENT_LOG_FILENAME);
}

export function getMetricsPath(dataDir: string): string {
  return join(dataDir, METRICS_FILENAME);
}

function isNotFound(error: unknown): boolean {
  return (error as NodeJS.ErrnoException).code === 'ENOENT';
}

/**
 * Append-only JSON-lines event log.
 */
export class JsonlEventLog implements EventSink {
  private directoryReady = false;
  /** Set once the file is known to end with a newline; cleared by a failed append */
  private lineBoundary = false;

  constructor(readonly location: string) {}

  /**
   * Append one entry as a line. A torn tail left by a crash or a failed
   * append is closed off first, so the new entry starts on its own line.
   */
  async append(entry: EventLogEntry): Promise<void> {
    if (!this.directoryReady) {
      await mkdir(dirname(this.location), { recursive: true, mode: 0o700 });
      this.directoryReady = true;
    }

    const separator = this.lineBoundary || (await this.endsWithNewline()) ? '' : '\n';
    if (separator) {
      log.warn({ path: this.location }, 'Audit log ends in a partial line, starting a new one');
    }

    try {
      await appendFile(this.location, separator + JSON.stringify(entry) + '\n', 'utf-8');
      this.lineBoundary = true;
    } catch (error) {
      this.lineBoundary = false;
      throw error;
    }
  }

  private async endsWithNewline(): Promise<boolean> {
    let handle: FileHandle;
    try {
      handle = await open(this.location, 'r');
    } catch (error) {
      if (isNotFound(error)) {
        return true;
      }
      throw error;
    }

    try {
      const { size } = await handle.stat();
      if (size === 0) {
        return true;
      }
      const last = Buffer.alloc(1);
      await handle.read(last, 0, 1, size - 1);
      return last[0] === 0x0a;
    } finally {
      await handle.close();
    }
  }

  /**
   * Read every entry. A missing file is an empty log. Lines that fail to
   * parse (e.g. a write torn by a crash) are skipped and reported.
   */
  async read(): Promise<EventLogReadResult> {
    let content: string;
    try {
      content = await readFile(this.location, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return { entries: [], malformedLines: [] };
      }
      throw error;
    }

    const entries: EventLogEntry[] = [];
    const malformedLines: number[] = [];

    content.split('\n').forEach((line, index) => {
      if (!line.trim()) return;
      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch {
        malformedLines.push(index + 1);
        return;
      }
      const result = eventLogEntrySchema.safeParse(raw);
      if (result.success) {
        entries.push(result.data);
      } else {
        malformedLines.push(index + 1);
      }
    });

    if (malformedLines.length > 0) {
      log.warn({ path: this.location, malformedLines }, 'Skipped malformed audit log lines');
    }

    return { entries, malformedLines };
  }
}

/**
 * Metrics side file.
 */
export class JsonMetricsFile implements MetricsStore {
  constructor(readonly location: string) {}

  async save(state: MetricsState): Promise<void> {
    await mkdir(dirname(this.location), { recursive: true, mode: 0o700 });
    const tmpPath = `${this.location}.tmp`;
    await writeFile(tmpPath, JSON.stringify(state, null, 2), 'utf-8');
    await rename(tmpPath, this.location);
  }

  async load(): Promise<MetricsState | null> {
    try {
      const content = await readFile(this.location, 'utf-8');
      const data: unknown = JSON.parse(content);
      const result = metricsStateSchema.safeParse(data);
      if (!result.success) {
        log.warn({ path: this.location, errors: result.error.errors }, 'Ignoring invalid metrics file');
        return null;
      }
      return result.data;
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      log.error({ error, path: this.location }, 'Failed to load metrics file');
      throw error;
    }
  }
}
