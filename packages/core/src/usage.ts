/**
 * Usage recording boundary.
 *
 * The orchestrator reports one entry per successful call. Recording is best
 * effort: a recorder that throws or rejects is logged by the caller and the
 * request still succeeds.
 */

export interface UsageEntry {
  /** Feature or operation name, e.g. "chat", "embedding", "translation". */
  readonly feature: string;
  readonly provider: string;
  readonly model: string;
  readonly prompt_tokens: number;
  readonly completion_tokens: number;
  readonly total_tokens: number;
  /** Characters processed, for translation. */
  readonly characters?: number;
  readonly estimated_cost?: number;
  readonly timestamp: Date;
}

export interface UsageRecorder {
  record(entry: UsageEntry): void | Promise<void>;
}

/** Totals for one day, feature and provider. */
export interface UsageReportRow {
  readonly date: string;
  readonly feature: string;
  readonly provider: string;
  readonly requests: number;
  readonly prompt_tokens: number;
  readonly completion_tokens: number;
  readonly total_tokens: number;
  readonly characters: number;
  readonly estimated_cost: number;
}

export interface UsageReportFilter {
  feature?: string;
  provider?: string;
  /** Inclusive, `YYYY-MM-DD`. */
  from?: string;
  to?: string;
}

/** Keeps every entry in memory and aggregates on demand. */
export class InMemoryUsageRecorder implements UsageRecorder {
  private _entries: UsageEntry[] = [];

  record(entry: UsageEntry): void {
    this._entries.push(entry);
  }

  get entries(): readonly UsageEntry[] {
    return this._entries;
  }

  /** Aggregate per UTC day, feature and `provider:model`, sorted by those keys. */
  report(filter: UsageReportFilter = {}): UsageReportRow[] {
    const rows = new Map<string, UsageReportRow>();

    for (const entry of this._entries) {
      const date = entry.timestamp.toISOString().slice(0, 10);
      const provider = `${entry.provider}:${entry.model}`;
      if (filter.feature !== undefined && entry.feature !== filter.feature) continue;
      if (filter.provider !== undefined && entry.provider !== filter.provider) continue;
      if (filter.from !== undefined && date < filter.from) continue;
      if (filter.to !== undefined && date > filter.to) continue;

      const key = `${date}|${entry.feature}|${provider}`;
      const row = rows.get(key);
      rows.set(key, {
        date,
        feature: entry.feature,
        provider,
        requests: (row?.requests ?? 0) + 1,
        prompt_tokens: (row?.prompt_tokens ?? 0) + entry.prompt_tokens,
        completion_tokens: (row?.completion_tokens ?? 0) + entry.completion_tokens,
        total_tokens: (row?.total_tokens ?? 0) + entry.total_tokens,
        characters: (row?.characters ?? 0) + (entry.characters ?? 0),
        estimated_cost: (row?.estimated_cost ?? 0) + (entry.estimated_cost ?? 0),
      });
    }

    return Array.from(rows.entries())
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([, row]) => row);
  }

  clear(): void {
    this._entries = [];
  }
}
