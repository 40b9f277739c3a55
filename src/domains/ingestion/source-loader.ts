// ──────────────────────────────────────────
// Ingestion: Source loader
// ──────────────────────────────────────────
// Resolves a logical source to at most one file across the search
// directories. Missing and unreadable files become typed results, never
// exceptions: the dashboard renders from whatever subset is present.

import fs from 'fs/promises';
import path from 'path';
import { IngestionContract } from '../../shared/contracts';
import { errorMessage } from '../../shared/errors';
import { LoadResult, RawTable, ResolvedSource, SourceName } from '../../shared/types';
import { emptyTable, parseCsv } from './csv';
import { findSource } from './sources';

export class SourceLoader implements IngestionContract {
  constructor(private dataDirs: string[]) {}

  async resolve(source: SourceName): Promise<ResolvedSource | null> {
    const definition = findSource(source);
    if (!definition) return null;

    for (const dir of this.dataDirs) {
      for (const candidate of definition.candidates) {
        const resolved = await this.statFile(source, path.join(dir, candidate));
        if (resolved) return resolved;
      }

      // Case-insensitive fallback, e.g. "FACEBOOK.csv"
      const wanted = new Set(definition.candidates.map((c) => c.toLowerCase()));
      const entries = await fs.readdir(dir).catch((): string[] => []);
      for (const entry of [...entries].sort()) {
        if (!wanted.has(entry.toLowerCase())) continue;
        const resolved = await this.statFile(source, path.join(dir, entry));
        if (resolved) return resolved;
      }
    }

    return null;
  }

  async loadResult(source: SourceName, resolved?: ResolvedSource | null): Promise<LoadResult> {
    const target = resolved === undefined ? await this.resolve(source) : resolved;
    if (!target) {
      return { status: 'missing', source, tried: this.candidatePaths(source) };
    }

    try {
      const text = await fs.readFile(target.path, 'utf-8');
      const table = parseCsv(text);
      return { status: 'loaded', source, path: target.path, table };
    } catch (err) {
      const reason = errorMessage(err);
      console.warn(`[Loader] ${source}: could not read ${target.path}: ${reason}`);
      return { status: 'corrupt', source, path: target.path, reason };
    }
  }

  async load(source: SourceName): Promise<RawTable> {
    const result = await this.loadResult(source);
    return result.status === 'loaded' ? result.table : emptyTable();
  }

  candidatePaths(source: SourceName): string[] {
    const definition = findSource(source);
    if (!definition) return [];
    return this.dataDirs.flatMap((dir) => definition.candidates.map((c) => path.join(dir, c)));
  }

  private async statFile(source: SourceName, filePath: string): Promise<ResolvedSource | null> {
    const stats = await fs.stat(filePath).catch(() => null);
    if (!stats || !stats.isFile()) return null;
    return { source, path: filePath, mtime_ms: stats.mtimeMs, size: stats.size };
  }
}
