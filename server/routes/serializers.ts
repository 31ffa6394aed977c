/**
 * Response shapes. Entities leave the API with the same snake_case names
 * they are stored under; dates are ISO strings.
 */

import type { HistoryEntry, Quote, QuoteItem } from "../../shared/types";
import type { BulkResult } from "../services/bulkQuoteActions";
import type { AnalyticsSummary, StatusBreakdownEntry } from "../services/quoteAnalytics";
import type { CompanyQuotes, QuoteHistory } from "../services/quoteService";

function isoOrNull(date: Date | null): string | null {
    return date ? date.toISOString() : null;
}

export function serializeQuoteItem(item: QuoteItem) {
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

/**
 * admin_notes is internal and only included for staff callers
 */
export function serializeQuote(quote: Quote, options: { includeAdminNotes: boolean }) {
    return {
        id: quote.id,
        customer_info: {
            name: quote.customerInfo.name,
            email: quote.customerInfo.email,
            company: quote.customerInfo.company ?? null,
            phone: quote.customerInfo.phone ?? null,
            address: quote.customerInfo.address ?? null,
        },
        items: quote.items.map(serializeQuoteItem),
        status: quote.status,
        total_estimate: quote.totalEstimate,
        notes: quote.notes,
        ...(options.includeAdminNotes && { admin_notes: quote.adminNotes }),
        created_by: quote.createdBy,
        created_at: quote.createdAt.toISOString(),
        updated_at: quote.updatedAt.toISOString(),
        expires_at: quote.expiresAt.toISOString(),
        requested_delivery_date: isoOrNull(quote.requestedDeliveryDate),
        last_emailed_at: isoOrNull(quote.lastEmailedAt),
        last_follow_up_at: isoOrNull(quote.lastFollowUpAt),
        discount_applied: quote.discountApplied,
        discount_reason: quote.discountReason,
    };
}

export function serializeHistoryEntry(entry: HistoryEntry) {
    return {
        id: entry.id,
        action: entry.action,
        field_changed: entry.fieldChanged,
        old_value: entry.oldValue,
        new_value: entry.newValue,
        changed_by: entry.changedBy,
        timestamp: entry.timestamp.toISOString(),
        notes: entry.notes,
    };
}

export function serializeHistory(history: QuoteHistory) {
    return {
        quote_id: history.quoteId,
        quote_status: history.quoteStatus,
        history: history.history.map(serializeHistoryEntry),
    };
}

export function serializeBulkResult(result: BulkResult) {
    return {
        message: "Bulk action completed",
        action: result.action,
        processed_count: result.processed.length,
        failed_count: result.failed.length,
        processed_quotes: result.processed.map((entry) => ({
            quote_id: entry.quoteId,
            action: entry.action,
            old_status: entry.oldStatus,
            new_status: entry.newStatus,
        })),
        failed_quotes: result.failed.map((entry) => ({
            quote_id: entry.quoteId,
            reason: entry.reason,
        })),
    };
}

export function serializeCompanyQuotes(result: CompanyQuotes, options: { includeAdminNotes: boolean }) {
    return {
        company_id: result.companyId,
        company_name: result.companyName,
        quote_sharing_enabled: result.quoteSharingEnabled,
        quotes: result.quotes.map((quote) => serializeQuote(quote, options)),
        total_count: result.totalCount,
    };
}

export function serializeStatusBreakdown(entries: StatusBreakdownEntry[]) {
    return entries.map((entry) => ({
        status: entry.status,
        count: entry.count,
        percentage: entry.percentage,
    }));
}

export function serializeAnalyticsSummary(summary: AnalyticsSummary) {
    return {
        total_quotes: summary.totalQuotes,
        recent_quotes: summary.recentQuotes,
        pending_quotes: summary.pendingQuotes,
        converted_quotes: summary.convertedQuotes,
        conversion_rate: summary.conversionRate,
        user_role: summary.userRole,
    };
}
