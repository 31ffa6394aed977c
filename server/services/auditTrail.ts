/**
 * Audit Trail
 *
 * Append-only quote history. Quotes that predate history recording get a
 * synthesized timeline built from their own timestamps; synthesized entries
 * carry ids with the reserved "synthetic:" prefix and are never stored.
 */

import type { HistoryEntry, NewHistoryEntry, Quote } from '../../shared/types';
import { INITIAL_STATUS } from '../../shared/quoteWorkflow';
import { logger } from '../logger';
import type { QuoteHistoryStore } from '../storage/types';

export const SYNTHETIC_ID_PREFIX = 'synthetic:';

export class AuditTrail {
  constructor(private readonly store: QuoteHistoryStore) { }

  async record(entry: NewHistoryEntry): Promise<HistoryEntry> {
    return await this.store.append(entry);
  }

  /**
   * Appends an entry; a failed append is logged and does not propagate
   */
  async recordSafely(entry: NewHistoryEntry): Promise<HistoryEntry | null> {
    try {
      return await this.record(entry);
    } catch (error) {
      logger.error('[AuditTrail] Failed to append history entry', {
        quoteId: entry.quoteId,
        action: entry.action,
        error,
      });
      return null;
    }
  }

  /**
   * Stored entries newest first, or the synthesized timeline when none exist
   */
  async history(quote: Quote): Promise<HistoryEntry[]> {
    const stored = await this.store.listForQuote(quote.id);
    if (stored.length > 0) {
      return [...stored].sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());
    }
    return synthesizeHistory(quote);
  }
}

export function synthesizeHistory(quote: Quote): HistoryEntry[] {
  const entries: HistoryEntry[] = [
    {
      id: `${SYNTHETIC_ID_PREFIX}creation`,
      quoteId: quote.id,
      action: 'created',
      fieldChanged: 'status',
      oldValue: null,
      newValue: INITIAL_STATUS,
      changedBy: quote.createdBy,
      timestamp: quote.createdAt,
      notes: 'Quote created',
    },
    {
      id: `${SYNTHETIC_ID_PREFIX}last_update`,
      quoteId: quote.id,
      action: 'updated',
      fieldChanged: 'status',
      oldValue: INITIAL_STATUS,
      newValue: quote.status,
      changedBy: quote.createdBy,
      timestamp: quote.updatedAt,
      notes: `Quote status: ${quote.status}`,
    },
  ];

  if (quote.lastEmailedAt) {
    entries.push({
      id: `${SYNTHETIC_ID_PREFIX}emailed`,
      quoteId: quote.id,
      action: 'emailed',
      fieldChanged: 'status',
      oldValue: null,
      newValue: 'sent',
      changedBy: 'system',
      timestamp: quote.lastEmailedAt,
      notes: 'Quote emailed to customer',
    });
  }

  return entries.sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());
}
