import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { AuditRecord } from '../schema/audit.js';
import * as log from '../utils/logger.js';
import { generateMarkdown, serializeAuditJSON } from './reporter.js';

// ── Sink contract ────────────────────────────────────────────
// Receives exactly one record per task, at its terminal state.

export interface AuditSink {
  emit(record: AuditRecord): Promise<void>;
}

export class MemoryAuditSink implements AuditSink {
  readonly records: AuditRecord[] = [];

  async emit(record: AuditRecord): Promise<void> {
    this.records.push(record);
  }

  get(taskId: string): AuditRecord | undefined {
    return this.records.find((r) => r.taskId === taskId);
  }
}

/** Writes `<taskId>.json` (sorted keys) and `<taskId>.md` into a directory. */
export class FileAuditSink implements AuditSink {
  constructor(readonly dir: string) {}

  async emit(record: AuditRecord): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    const base = path.join(this.dir, record.taskId.replace(/[^A-Za-z0-9._-]/g, '_'));
    await writeFile(`${base}.json`, serializeAuditJSON(record) + '\n', 'utf-8');
    await writeFile(`${base}.md`, generateMarkdown(record), 'utf-8');
    log.detail(`Audit written to ${base}.json`);
  }
}
