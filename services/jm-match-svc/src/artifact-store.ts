import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { getLogger } from '@jobmatch/common';
import type { Logger } from 'pino';

import type { ArtifactPayload, ArtifactSink } from './types';

function csvCell(value: unknown): string {
  if (value === undefined || value === null) {
    return '';
  }

  const text = typeof value === 'object' ? JSON.stringify(value) : String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/** Header is every key in order of first appearance across the rows. */
export function toCsv(rows: ReadonlyArray<Record<string, unknown>>): string {
  const columns: string[] = [];
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!columns.includes(key)) {
        columns.push(key);
      }
    }
  }

  const lines = [columns.map(csvCell).join(',')];
  for (const row of rows) {
    lines.push(columns.map((column) => csvCell(row[column])).join(','));
  }
  return `${lines.join('\n')}\n`;
}

export function serializeArtifact(payload: ArtifactPayload): string {
  switch (payload.format) {
    case 'json':
      return `${JSON.stringify(payload.data, null, 2)}\n`;
    case 'csv':
      return toCsv(payload.rows);
    case 'text':
      return payload.text;
  }
}

export interface FileArtifactStoreOptions {
  resultsDir: string;
  logger?: Logger;
}

export class FileArtifactStore implements ArtifactSink {
  readonly resultsDir: string;
  private readonly logger: Logger;

  constructor({ resultsDir, logger }: FileArtifactStoreOptions) {
    this.resultsDir = resultsDir;
    this.logger = logger ?? getLogger({ module: 'artifact-store' });
  }

  async write(name: string, payload: ArtifactPayload): Promise<string> {
    const target = path.isAbsolute(name) ? name : path.join(this.resultsDir, name);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, serializeArtifact(payload), 'utf8');
    this.logger.debug({ file: target, format: payload.format }, 'Artifact written.');
    return target;
  }
}
