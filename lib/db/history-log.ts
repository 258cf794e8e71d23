import { and, desc, eq, lt, type SQL } from 'drizzle-orm';

import type { HistoryLog } from '@/lib/pipeline/storage/types';
import { HistoryEntrySchema, type HistoryEntry } from '@/lib/pipeline/types';
import type { Database } from './client';
import { historyEntries } from './schema';

export class PostgresHistoryLog implements HistoryLog {
  constructor(private readonly db: Database) {}

  async append(entry: HistoryEntry): Promise<void> {
    const valid = HistoryEntrySchema.parse(entry);
    await this.db.insert(historyEntries).values({
      recording_id: valid.recordingId,
      terminal_status: valid.terminalStatus,
      timestamp: valid.timestamp,
      summary: valid.summary,
      stage: valid.stage ?? null,
      kind: valid.kind ?? null,
    });
  }

  async list(options: { limit?: number; recordingId?: string } = {}): Promise<HistoryEntry[]> {
    const filters: SQL[] = [];
    if (options.recordingId) filters.push(eq(historyEntries.recording_id, options.recordingId));

    const rows = await this.db
      .select()
      .from(historyEntries)
      .where(and(...filters))
      .orderBy(desc(historyEntries.timestamp), desc(historyEntries.id))
      .limit(options.limit ?? 50);

    return rows.map(row => ({
      recordingId: row.recording_id,
      terminalStatus: row.terminal_status,
      timestamp: row.timestamp,
      summary: row.summary,
      stage: row.stage ?? undefined,
      kind: row.kind ?? undefined,
    }));
  }

  async purge(before?: number): Promise<number> {
    const removed = await this.db
      .delete(historyEntries)
      .where(before === undefined ? undefined : lt(historyEntries.timestamp, before))
      .returning({ id: historyEntries.id });
    return removed.length;
  }
}
