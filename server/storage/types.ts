/**
 * Persistence and directory ports consumed by the service layer.
 *
 * Drizzle implementations live beside this file; tests use the in-memory
 * fakes in server/tests/fakes.ts.
 */

import type {
  CatalogProduct,
  Company,
  FollowUpType,
  HistoryEntry,
  Identity,
  NewHistoryEntry,
  Quote,
  QuoteStatus,
} from "../../shared/types";

export type NewQuote = Omit<Quote, "id">;

export interface QuoteFilter {
  createdBy?: string;
  /** Matches quotes created by any of these users; an empty list matches nothing */
  createdByIn?: readonly string[];
  status?: QuoteStatus;
  /** Case-insensitive substring match on customer_info.email */
  customerEmail?: string;
  /** Inclusive lower bound on created_at */
  createdSince?: Date;
}

export type StatusCounts = Partial<Record<QuoteStatus, number>>;

export interface Page {
  skip: number;
  limit: number;
}

/**
 * Mutator run against the current stored quote. Returns the full replacement,
 * or null to leave the quote untouched. Throwing aborts the update.
 */
export type QuoteMutator = (current: Quote) => Quote | null | Promise<Quote | null>;

export interface QuoteStore {
  insert(quote: NewQuote): Promise<Quote>;
  findById(id: string): Promise<Quote | undefined>;
  /** Newest first (created_at descending) */
  list(filter: QuoteFilter, page: Page): Promise<Quote[]>;
  /**
   * Atomic read-modify-write of one quote. Concurrent updates of the same
   * quote are serialized. Resolves undefined when the quote does not exist.
   */
  update(id: string, mutator: QuoteMutator): Promise<Quote | undefined>;
  /**
   * Deletes the quote only while it is still in `expectedStatus`, in a single
   * conditional write. Resolves false when the quote is absent or has moved on.
   */
  delete(id: string, expectedStatus: QuoteStatus): Promise<boolean>;
  /** Quotes matching the filter, grouped by status; statuses with no quotes are omitted */
  countByStatus(filter: QuoteFilter): Promise<StatusCounts>;
}

export interface QuoteHistoryStore {
  append(entry: NewHistoryEntry): Promise<HistoryEntry>;
  /** Newest first */
  listForQuote(quoteId: string): Promise<HistoryEntry[]>;
}

export interface CompanyDirectory {
  getCompany(companyId: string): Promise<Company | undefined>;
  getUsersByCompany(companyId: string): Promise<Identity[]>;
}

export interface UserDirectory {
  getUser(userId: string): Promise<Identity | undefined>;
}

export interface CatalogService {
  getProducts(productIds: readonly string[]): Promise<CatalogProduct[]>;
}

export interface QuoteDocumentOptions {
  recipientEmail: string;
  customMessage?: string;
}

/**
 * Each method resolves to whether the message was delivered.
 * Rejections are handled by the notification queue.
 */
export interface NotificationDispatcher {
  sendStatusChange(quote: Quote, newStatus: QuoteStatus, notes: string | null): Promise<boolean>;
  sendQuoteDocument(quote: Quote, products: CatalogProduct[], options: QuoteDocumentOptions): Promise<boolean>;
  sendFollowUp(quote: Quote, followUpType: FollowUpType): Promise<boolean>;
}
