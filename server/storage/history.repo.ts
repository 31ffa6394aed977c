import type { Database } from "../db";
import { quoteHistory, type QuoteHistoryRow } from "../../shared/schema";
import { isHistoryAction, type HistoryEntry, type NewHistoryEntry } from "../../shared/types";
import type { QuoteHistoryStore } from "./types";
import { desc, eq } from "drizzle-orm";

function toHistoryEntry(row: QuoteHistoryRow): HistoryEntry {
    if (!isHistoryAction(row.action)) {
        throw new Error(`History entry ${row.id} has unknown action "${row.action}"`);
    }

    return {
        id: row.id,
        quoteId: row.quoteId,
        action: row.action,
        fieldChanged: row.fieldChanged,
        oldValue: row.oldValue,
        newValue: row.newValue,
        changedBy: row.changedBy,
        timestamp: row.timestamp,
        notes: row.notes,
    };
}

/**
 * Append-only: there is no update or delete path for history rows.
 */
export class QuoteHistoryRepository implements QuoteHistoryStore {
    constructor(private readonly dbInstance: Database) { }

    async append(entry: NewHistoryEntry): Promise<HistoryEntry> {
        const [row] = await this.dbInstance.insert(quoteHistory).values({ ...entry }).returning();
        return toHistoryEntry(row);
    }

    async listForQuote(quoteId: string): Promise<HistoryEntry[]> {
        const rows = await this.dbInstance
            .select()
            .from(quoteHistory)
            .where(eq(quoteHistory.quoteId, quoteId))
            .orderBy(desc(quoteHistory.timestamp));
        return rows.map(toHistoryEntry);
    }
}
