/**
 * Artifact layout manager.
 *
 * Enforces the standard artifact layout:
 *   ./artifacts/<runId>/logs.jsonl
 *   ./artifacts/<runId>/evidence/*.json
 *   ./artifacts/<runId>/raw/<source_id>.json
 *   ./artifacts/<runId>/summary.json
 */

import { mkdirSync, writeFileSync } from 'fs';
import { resolve, join } from 'path';
import { createHash, randomUUID } from 'crypto';
import { redact } from './redact.js';
import type { RunnerErrorEnvelope } from './errors.js';

export interface ArtifactSummary {
  run_id: string;
  command: string;
  started_at: string;
  finished_at: string;
  exit_code: number;
  idempotency_key: string;
  artifact_dir: string;
  files: string[];
  error?: RunnerErrorEnvelope;
  stats?: Record<string, unknown>;
}

export interface ArtifactWriter {
  /** Root directory for this run's artifacts. */
  readonly dir: string;
  readonly runId: string;
  readonly logsPath: string;

  /** Write a JSON evidence file into evidence/. */
  writeEvidence(name: string, data: unknown): string;

  /**
   * Archive a raw source payload into raw/. Write-once: a second write
   * for the same name in the same run throws.
   */
  archiveRaw(name: string, body: unknown): string;

  /** Finalize: write summary.json and return it. */
  finalize(opts: {
    command: string;
    startedAt: string;
    exitCode: number;
    idempotencyKey: string;
    error?: RunnerErrorEnvelope;
    stats?: Record<string, unknown>;
  }): ArtifactSummary;
}

function safeFileName(name: string): string {
  return name.replace(/[^a-zA-Z0-9_.-]/g, '_');
}

/**
 * Generate a run-ID from the current UTC timestamp + randomness.
 * Format: YYYYMMDD-HHmmss-<short-uuid>
 */
export function generateRunId(now: Date = new Date()): string {
  const pad = (n: number, w = 2): string => String(n).padStart(w, '0');
  const date = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}`;
  const time = `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  const short = randomUUID().slice(0, 8);
  return `${date}-${time}-${short}`;
}

/**
 * Build an idempotency key from a command name + relevant inputs.
 * The key is a SHA-256 hex digest so it can be used as a file-safe
 * dedup token.
 */
export function buildIdempotencyKey(parts: string[]): string {
  const hash = createHash('sha256');
  for (const p of parts) hash.update(p).update('\0');
  return hash.digest('hex');
}

/**
 * Create an ArtifactWriter rooted at `<base>/artifacts/<runId>`.
 */
export function createArtifactWriter(base: string, runId?: string): ArtifactWriter {
  const id = runId ?? generateRunId();
  const dir = resolve(base, 'artifacts', id);
  const evidenceDir = join(dir, 'evidence');
  const rawDir = join(dir, 'raw');
  const logsPath = join(dir, 'logs.jsonl');

  mkdirSync(evidenceDir, { recursive: true });

  const files: string[] = [];

  return {
    dir,
    runId: id,
    logsPath,

    writeEvidence(name: string, data: unknown): string {
      const safeName = safeFileName(name);
      const filePath = join(evidenceDir, `${safeName}.json`);
      writeFileSync(filePath, JSON.stringify(redact(data), null, 2), 'utf-8');
      files.push(`evidence/${safeName}.json`);
      return filePath;
    },

    archiveRaw(name: string, body: unknown): string {
      const safeName = safeFileName(name);
      const filePath = join(rawDir, `${safeName}.json`);
      mkdirSync(rawDir, { recursive: true });
      writeFileSync(filePath, JSON.stringify(redact(body), null, 2), { encoding: 'utf-8', flag: 'wx' });
      files.push(`raw/${safeName}.json`);
      return filePath;
    },

    finalize(opts): ArtifactSummary {
      const summary: ArtifactSummary = {
        run_id: id,
        command: opts.command,
        started_at: opts.startedAt,
        finished_at: new Date().toISOString(),
        exit_code: opts.exitCode,
        idempotency_key: opts.idempotencyKey,
        artifact_dir: dir,
        files: ['logs.jsonl', ...files, 'summary.json'],
        ...(opts.error && { error: opts.error }),
        ...(opts.stats && { stats: opts.stats }),
      };

      writeFileSync(join(dir, 'summary.json'), JSON.stringify(summary, null, 2), 'utf-8');
      return summary;
    },
  };
}
