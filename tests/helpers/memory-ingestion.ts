import { IngestionContract } from '../../src/shared/contracts';
import { LoadResult, RawTable, ResolvedSource, SourceName } from '../../src/shared/types';
import { emptyTable, parseCsv } from '../../src/domains/ingestion/csv';

/** In-memory stand-in for SourceLoader: sources are CSV strings keyed by name. */
export class MemoryIngestion implements IngestionContract {
  resolveCalls = 0;
  loadCalls = 0;
  private versions = new Map<SourceName, number>();

  constructor(private files: Partial<Record<SourceName, string>>) {}

  set(source: SourceName, csv: string | undefined): void {
    this.files[source] = csv;
    this.versions.set(source, (this.versions.get(source) ?? 0) + 1);
  }

  async resolve(source: SourceName): Promise<ResolvedSource | null> {
    this.resolveCalls++;
    const csv = this.files[source];
    if (csv === undefined) return null;
    return { source, path: `memory://${source}`, mtime_ms: this.versions.get(source) ?? 0, size: csv.length };
  }

  async loadResult(source: SourceName, resolved?: ResolvedSource | null): Promise<LoadResult> {
    this.loadCalls++;
    const target = resolved === undefined ? await this.resolve(source) : resolved;
    const csv = this.files[source];
    if (!target || csv === undefined) return { status: 'missing', source, tried: [`memory://${source}`] };
    try {
      return { status: 'loaded', source, path: target.path, table: parseCsv(csv) };
    } catch (err) {
      return { status: 'corrupt', source, path: target.path, reason: err instanceof Error ? err.message : String(err) };
    }
  }

  async load(source: SourceName): Promise<RawTable> {
    const result = await this.loadResult(source);
    return result.status === 'loaded' ? result.table : emptyTable();
  }
}

export function csv(...lines: string[]): string {
  return lines.join('\n');
}
