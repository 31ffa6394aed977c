import type { Database } from "../db";
import {
    quotes,
    type CustomerInfoDocument,
    type InsertQuoteRow,
    type QuoteItemDocument,
    type QuoteRow,
} from "../../shared/schema";
import { isQuoteStatus, type CustomerInfo, type Quote, type QuoteItem, type QuoteStatus } from "../../shared/types";
import type { NewQuote, Page, QuoteFilter, QuoteMutator, QuoteStore, StatusCounts } from "./types";
import { and, desc, eq, gte, inArray, sql, type SQL } from "drizzle-orm";

export function toDecimal(value: number | null): string | null {
    return value === null ? null : value.toFixed(2);
}

export function fromDecimal(value: string | null): number | null {
    if (value === null) return null;
    const parsed = Number.parseFloat(value);
    return Number.isFinite(parsed) ? parsed : null;
}

function escapeLikePattern(value: string): string {
    return value.replace(/[\\%_]/g, (match) => `\\${match}`);
}

function toCustomerInfo(doc: CustomerInfoDocument): CustomerInfo {
    return {
        name: doc.name,
        email: doc.email,
        company: doc.company ?? null,
        phone: doc.phone ?? null,
        address: doc.address ?? null,
    };
}

function toCustomerInfoDocument(info: CustomerInfo): CustomerInfoDocument {
    return {
        name: info.name,
        email: info.email,
        company: info.company ?? null,
        phone: info.phone ?? null,
        address: info.address ?? null,
    };
}

function toQuoteItem(doc: QuoteItemDocument): QuoteItem {
    return {
        productId: doc.product_id,
        productName: doc.product_name,
        quantity: doc.quantity,
        unitPrice: doc.unit_price ?? null,
        originalPrice: doc.original_price ?? null,
        discountApplied: doc.discount_applied ?? 0,
        notes: doc.notes ?? null,
    };
}

function toQuoteItemDocument(item: QuoteItem): QuoteItemDocument {
    return {
        product_id: item.productId,
        product_name: item.productName,
        quantity: item.quantity,
        unit_price: item.unitPrice,
        original_price: item.originalPrice,
        discount_applied: item.discountApplied,
        notes: item.notes,
    };
}

export function toQuote(row: QuoteRow): Quote {
    if (!isQuoteStatus(row.status)) {
        throw new Error(`Quote ${row.id} has unknown status "${row.status}"`);
    }

    return {
        id: row.id,
        customerInfo: toCustomerInfo(row.customerInfo),
        items: row.items.map(toQuoteItem),
        status: row.status,
        totalEstimate: fromDecimal(row.totalEstimate),
        notes: row.notes,
        adminNotes: row.adminNotes,
        createdBy: row.createdBy,
        createdAt: row.createdAt,
        updatedAt: row.updatedAt,
        expiresAt: row.expiresAt,
        requestedDeliveryDate: row.requestedDeliveryDate,
        lastEmailedAt: row.lastEmailedAt,
        lastFollowUpAt: row.lastFollowUpAt,
        discountApplied: fromDecimal(row.discountApplied),
        discountReason: row.discountReason,
    };
}

function toQuoteValues(quote: NewQuote): Omit<InsertQuoteRow, "id"> {
    return {
        customerInfo: toCustomerInfoDocument(quote.customerInfo),
        items: quote.items.map(toQuoteItemDocument),
        status: quote.status,
        totalEstimate: toDecimal(quote.totalEstimate),
        notes: quote.notes,
        adminNotes: quote.adminNotes,
        createdBy: quote.createdBy,
        createdAt: quote.createdAt,
        updatedAt: quote.updatedAt,
        expiresAt: quote.expiresAt,
        requestedDeliveryDate: quote.requestedDeliveryDate,
        lastEmailedAt: quote.lastEmailedAt,
        lastFollowUpAt: quote.lastFollowUpAt,
        discountApplied: toDecimal(quote.discountApplied),
        discountReason: quote.discountReason,
    };
}

// null means the filter can match nothing
function buildConditions(filter: QuoteFilter): SQL[] | null {
    const conditions: SQL[] = [];

    if (filter.createdByIn) {
        if (filter.createdByIn.length === 0) return null;
        conditions.push(inArray(quotes.createdBy, [...filter.createdByIn]));
    }
    if (filter.createdBy) {
        conditions.push(eq(quotes.createdBy, filter.createdBy));
    }
    if (filter.status) {
        conditions.push(eq(quotes.status, filter.status));
    }
    if (filter.customerEmail) {
        const pattern = `%${escapeLikePattern(filter.customerEmail)}%`;
        conditions.push(sql`(${quotes.customerInfo} ->> 'email') ILIKE ${pattern}`);
    }
    if (filter.createdSince) {
        conditions.push(gte(quotes.createdAt, filter.createdSince));
    }
    return conditions;
}

export class QuotesRepository implements QuoteStore {
    constructor(private readonly dbInstance: Database) { }

    async insert(quote: NewQuote): Promise<Quote> {
        const [row] = await this.dbInstance.insert(quotes).values(toQuoteValues(quote)).returning();
        return toQuote(row);
    }

    async findById(id: string): Promise<Quote | undefined> {
        const [row] = await this.dbInstance.select().from(quotes).where(eq(quotes.id, id)).limit(1);
        return row ? toQuote(row) : undefined;
    }

    async list(filter: QuoteFilter, page: Page): Promise<Quote[]> {
        const conditions = buildConditions(filter);
        if (conditions === null) return [];

        const rows = await this.dbInstance
            .select()
            .from(quotes)
            .where(conditions.length > 0 ? and(...conditions) : undefined)
            .orderBy(desc(quotes.createdAt))
            .offset(page.skip)
            .limit(page.limit);

        return rows.map(toQuote);
    }

    async update(id: string, mutator: QuoteMutator): Promise<Quote | undefined> {
        return await this.dbInstance.transaction(async (tx) => {
            const [current] = await tx
                .select()
                .from(quotes)
                .where(eq(quotes.id, id))
                .for("update");

            if (!current) return undefined;

            const existing = toQuote(current);
            const next = await mutator(existing);
            if (next === null) return existing;

            const [row] = await tx
                .update(quotes)
                .set(toQuoteValues(next))
                .where(eq(quotes.id, id))
                .returning();
            return toQuote(row);
        });
    }

    async delete(id: string, expectedStatus: QuoteStatus): Promise<boolean> {
        const deleted = await this.dbInstance
            .delete(quotes)
            .where(and(eq(quotes.id, id), eq(quotes.status, expectedStatus)))
            .returning({ id: quotes.id });
        return deleted.length > 0;
    }

    async countByStatus(filter: QuoteFilter): Promise<StatusCounts> {
        const conditions = buildConditions(filter);
        if (conditions === null) return {};

        const rows = await this.dbInstance
            .select({ status: quotes.status, count: sql<number>`count(*)::int` })
            .from(quotes)
            .where(conditions.length > 0 ? and(...conditions) : undefined)
            .groupBy(quotes.status);

        const counts: StatusCounts = {};
        for (const row of rows) {
            if (isQuoteStatus(row.status)) {
                counts[row.status] = Number(row.count);
            }
        }
        return counts;
    }
}
