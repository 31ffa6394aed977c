/**
 * Quote Service
 *
 * The only entry point the HTTP layer calls. Every operation resolves the
 * quote, checks access through AccessGate, delegates rule-bearing work to the
 * state machine, discount engine or bulk coordinator, and records history.
 */

import { hasPermission, isStaff } from '../../shared/permissions';
import { computeTotalEstimate } from '../../shared/quotePricing';
import {
  computeExpiresAt,
  DELETABLE_STATUS,
  DELETE_REQUIRES_DRAFT,
  describeStatusChange,
  INITIAL_STATUS,
} from '../../shared/quoteWorkflow';
import {
  DEFAULT_PAGE_SIZE,
  MAX_PAGE_SIZE,
  type CreateQuoteInput,
  type QuoteItemInput,
  type UpdateQuoteInput,
} from '../../shared/schema';
import type {
  DiscountType,
  FollowUpType,
  HistoryEntry,
  Identity,
  Quote,
  QuoteItem,
  QuoteStatus,
} from '../../shared/types';
import { ForbiddenError, InvalidArgumentError, NotFoundError } from '../errors';
import { logger } from '../logger';
import type {
  CatalogService,
  CompanyDirectory,
  NotificationDispatcher,
  Page,
  QuoteFilter,
  QuoteStore,
} from '../storage/types';
import type { AccessGate } from './accessGate';
import type { AuditTrail } from './auditTrail';
import type { BulkQuoteActions, BulkRequest, BulkResult } from './bulkQuoteActions';
import type { DiscountEngine, DiscountResult } from './discountEngine';
import type { NotificationQueue } from './notificationQueue';
import type { AnalyticsSummary, QuoteAnalytics, StatusBreakdownEntry } from './quoteAnalytics';
import { transitionQuote, type Clock, type QuoteStateMachine } from './quoteStateMachine';

export interface QuoteServiceDeps {
  quotes: QuoteStore;
  companies: CompanyDirectory;
  catalog: CatalogService;
  dispatcher: NotificationDispatcher;
  notifications: NotificationQueue;
  accessGate: AccessGate;
  audit: AuditTrail;
  stateMachine: QuoteStateMachine;
  discounts: DiscountEngine;
  bulk: BulkQuoteActions;
  analytics: QuoteAnalytics;
  quoteValidityDays: number;
  now?: Clock;
}

export interface ListFilters {
  status?: QuoteStatus;
  customerEmail?: string;
}

export interface Pagination {
  skip?: number;
  limit?: number;
}

export interface TransitionRequestInput {
  newStatus: QuoteStatus;
  notes?: string;
  notifyCustomer?: boolean;
}

export interface TransitionSummary {
  oldStatus: QuoteStatus;
  newStatus: QuoteStatus;
  notificationQueued: boolean;
}

export interface DiscountInput {
  discountType: DiscountType;
  discountValue: number;
  applyToItems?: number[];
  reason?: string;
}

export interface QuoteHistory {
  quoteId: string;
  quoteStatus: QuoteStatus;
  history: HistoryEntry[];
}

export interface EmailQuoteOptions {
  recipientEmail?: string;
  customMessage?: string;
}

export interface EmailQuoteResult {
  recipientEmail: string;
  queued: boolean;
}

export interface FollowUpResult {
  recipientEmail: string;
  followUpType: FollowUpType;
  queued: boolean;
}

export interface CompanyQuotes {
  companyId: string;
  companyName: string;
  quoteSharingEnabled: boolean;
  quotes: Quote[];
  totalCount: number;
}

const FOLLOW_UP_ROLES: ReadonlySet<Identity['role']> = new Set<Identity['role']>(['admin', 'manager', 'sales_rep']);

function toQuoteItems(items: readonly QuoteItemInput[]): QuoteItem[] {
  return items.map((item) => ({
    productId: item.productId,
    productName: item.productName,
    quantity: item.quantity,
    unitPrice: item.unitPrice ?? null,
    originalPrice: null,
    discountApplied: 0,
    notes: item.notes ?? null,
  }));
}

function resolvePage(pagination: Pagination): Page {
  const skip = pagination.skip ?? 0;
  const limit = pagination.limit ?? DEFAULT_PAGE_SIZE;
  if (!Number.isInteger(skip) || skip < 0) {
    throw new InvalidArgumentError('skip must be a non-negative integer');
  }
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_PAGE_SIZE) {
    throw new InvalidArgumentError(`limit must be an integer between 1 and ${MAX_PAGE_SIZE}`);
  }
  return { skip, limit };
}

function requireStaff(requestor: Identity, action: string): void {
  if (!isStaff(requestor)) {
    throw new ForbiddenError(`Only admins and managers can ${action}`);
  }
}

export class QuoteService {
  private readonly now: Clock;

  constructor(private readonly deps: QuoteServiceDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async createQuote(input: CreateQuoteInput, requestor: Identity): Promise<Quote> {
    if (!hasPermission(requestor, 'quotes:create')) {
      throw new ForbiddenError('Insufficient permissions to create quotes');
    }
    if (input.items.length === 0) {
      throw new InvalidArgumentError('A quote needs at least one item');
    }

    const timestamp = this.now();
    const items = toQuoteItems(input.items);
    const quote = await this.deps.quotes.insert({
      customerInfo: input.customerInfo,
      items,
      status: INITIAL_STATUS,
      totalEstimate: computeTotalEstimate(items),
      notes: input.notes ?? null,
      adminNotes: null,
      createdBy: requestor.id,
      createdAt: timestamp,
      updatedAt: timestamp,
      expiresAt: computeExpiresAt(timestamp, this.deps.quoteValidityDays),
      requestedDeliveryDate: input.requestedDeliveryDate ?? null,
      lastEmailedAt: null,
      lastFollowUpAt: null,
      discountApplied: null,
      discountReason: null,
    });

    await this.recordCreated(quote, requestor, 'Quote created');
    logger.withIdentity(requestor).info('[QuoteService] Quote created', { quoteId: quote.id });
    return quote;
  }

  async listQuotes(filters: ListFilters, pagination: Pagination, requestor: Identity): Promise<Quote[]> {
    const page = resolvePage(pagination);
    const filter: QuoteFilter = {
      status: filters.status,
      customerEmail: filters.customerEmail || undefined,
    };
    if (!isStaff(requestor)) {
      filter.createdBy = requestor.id;
    }
    return await this.deps.quotes.list(filter, page);
  }

  async getQuote(quoteId: string, requestor: Identity): Promise<Quote> {
    return await this.loadAccessible(quoteId, requestor);
  }

  /**
   * Only staff may set adminNotes or override totalEstimate; those fields
   * are ignored for everyone else. A staff override wins over the total
   * recomputed from new items.
   */
  async updateQuote(quoteId: string, patch: UpdateQuoteInput, requestor: Identity): Promise<Quote> {
    const staff = isStaff(requestor);
    const timestamp = this.now();
    const changes: { fields: string[]; oldStatus?: QuoteStatus } = { fields: [] };

    const updated = await this.deps.quotes.update(quoteId, (current) => {
      if (!this.deps.accessGate.canMutateQuote(current, requestor)) {
        throw new ForbiddenError('Access denied');
      }

      let next: Quote = { ...current, updatedAt: timestamp };

      if (patch.customerInfo) {
        next.customerInfo = patch.customerInfo;
        changes.fields.push('customer_info');
      }
      if (patch.items) {
        if (patch.items.length === 0) {
          throw new InvalidArgumentError('A quote needs at least one item');
        }
        next.items = toQuoteItems(patch.items);
        next.totalEstimate = computeTotalEstimate(next.items);
        changes.fields.push('items');
      }
      if (patch.notes !== undefined && patch.notes !== null) {
        next.notes = patch.notes;
        changes.fields.push('notes');
      }
      if (staff) {
        if (patch.adminNotes !== undefined && patch.adminNotes !== null) {
          next.adminNotes = patch.adminNotes;
          changes.fields.push('admin_notes');
        }
        if (patch.totalEstimate !== undefined) {
          next.totalEstimate = patch.totalEstimate;
          changes.fields.push('total_estimate');
        }
      }
      if (patch.status && patch.status !== current.status) {
        next = transitionQuote(next, patch.status, requestor, undefined, timestamp);
        changes.oldStatus = current.status;
        changes.fields.push('status');
      }

      return next;
    });

    if (!updated) {
      throw new NotFoundError('Quote');
    }

    if (changes.oldStatus !== undefined) {
      await this.deps.audit.recordSafely({
        quoteId,
        action: 'status_changed',
        fieldChanged: 'status',
        oldValue: changes.oldStatus,
        newValue: updated.status,
        changedBy: requestor.id,
        timestamp,
        notes: describeStatusChange(changes.oldStatus, updated.status),
      });
    }

    if (changes.fields.length > 0) {
      await this.deps.audit.recordSafely({
        quoteId,
        action: 'updated',
        fieldChanged: changes.fields.join(','),
        oldValue: null,
        newValue: null,
        changedBy: requestor.id,
        timestamp,
        notes: `Updated ${changes.fields.join(', ')}`,
      });
    }

    logger.withIdentity(requestor).info('[QuoteService] Quote updated', { quoteId, fields: changes.fields });
    return updated;
  }

  /**
   * Hard delete, drafts only. Anything past draft is archived instead.
   */
  async deleteQuote(quoteId: string, requestor: Identity): Promise<void> {
    requireStaff(requestor, 'delete quotes');

    const quote = await this.deps.quotes.findById(quoteId);
    if (!quote) {
      throw new NotFoundError('Quote');
    }
    if (quote.status !== DELETABLE_STATUS) {
      throw new InvalidArgumentError(DELETE_REQUIRES_DRAFT);
    }

    const deleted = await this.deps.quotes.delete(quoteId, DELETABLE_STATUS);
    if (!deleted) {
      if (await this.deps.quotes.findById(quoteId)) {
        throw new InvalidArgumentError(DELETE_REQUIRES_DRAFT);
      }
      throw new NotFoundError('Quote');
    }
    logger.withIdentity(requestor).info('[QuoteService] Quote deleted', { quoteId });
  }

  async duplicateQuote(quoteId: string, requestor: Identity): Promise<Quote> {
    const source = await this.loadAccessible(quoteId, requestor);
    const timestamp = this.now();
    const items = source.items.map((item) => ({ ...item }));

    const copy = await this.deps.quotes.insert({
      customerInfo: { ...source.customerInfo },
      items,
      status: INITIAL_STATUS,
      totalEstimate: computeTotalEstimate(items),
      notes: `Duplicated from quote #${source.id}`,
      adminNotes: null,
      createdBy: requestor.id,
      createdAt: timestamp,
      updatedAt: timestamp,
      expiresAt: computeExpiresAt(timestamp, this.deps.quoteValidityDays),
      requestedDeliveryDate: null,
      lastEmailedAt: null,
      lastFollowUpAt: null,
      discountApplied: null,
      discountReason: null,
    });

    await this.recordCreated(copy, requestor, `Duplicated from quote #${source.id}`);
    logger.withIdentity(requestor).info('[QuoteService] Quote duplicated', { quoteId, newQuoteId: copy.id });
    return copy;
  }

  async transitionStatus(quoteId: string, request: TransitionRequestInput, requestor: Identity): Promise<TransitionSummary> {
    const outcome = await this.deps.stateMachine.transition(
      quoteId,
      request.newStatus,
      requestor,
      request.notes,
      request.notifyCustomer ?? false
    );
    return {
      oldStatus: outcome.oldStatus,
      newStatus: outcome.newStatus,
      notificationQueued: outcome.notificationQueued,
    };
  }

  async applyDiscount(quoteId: string, input: DiscountInput, requestor: Identity): Promise<DiscountResult> {
    requireStaff(requestor, 'apply discounts');

    return await this.deps.discounts.applyDiscount(
      quoteId,
      { type: input.discountType, value: input.discountValue, targetIndices: input.applyToItems },
      requestor,
      input.reason
    );
  }

  async bulkAction(request: BulkRequest, requestor: Identity): Promise<BulkResult> {
    return await this.deps.bulk.applyBulk(request, requestor);
  }

  async getHistory(quoteId: string, requestor: Identity): Promise<QuoteHistory> {
    const quote = await this.loadAccessible(quoteId, requestor);
    const history = await this.deps.audit.history(quote);
    return { quoteId: quote.id, quoteStatus: quote.status, history };
  }

  /**
   * Queues the quote document email. When it is delivered, a draft quote
   * moves to sent and last_emailed_at is stamped.
   */
  async emailQuote(quoteId: string, options: EmailQuoteOptions, requestor: Identity): Promise<EmailQuoteResult> {
    const quote = await this.loadAccessible(quoteId, requestor);
    const recipientEmail = options.recipientEmail || quote.customerInfo.email;
    if (!recipientEmail) {
      throw new InvalidArgumentError('No recipient email provided');
    }

    const products = await this.deps.catalog.getProducts(quote.items.map((item) => item.productId));

    const queued = this.deps.notifications.enqueue({
      kind: 'quote_email',
      quoteId,
      run: () => this.deps.dispatcher.sendQuoteDocument(quote, products, {
        recipientEmail,
        customMessage: options.customMessage,
      }),
      onDelivered: () => this.markEmailed(quoteId, recipientEmail),
    });

    logger.withIdentity(requestor).info('[QuoteService] Quote email queued', { quoteId, recipientEmail, queued });
    return { recipientEmail, queued };
  }

  async sendFollowUp(quoteId: string, followUpType: FollowUpType, requestor: Identity): Promise<FollowUpResult> {
    if (!FOLLOW_UP_ROLES.has(requestor.role)) {
      throw new ForbiddenError('Only admins, managers and sales reps can send follow-ups');
    }

    const quote = await this.loadAccessible(quoteId, requestor);
    const recipientEmail = quote.customerInfo.email;
    if (!recipientEmail) {
      throw new InvalidArgumentError('Quote has no customer email');
    }

    const queued = this.deps.notifications.enqueue({
      kind: `follow_up_${followUpType}`,
      quoteId,
      run: () => this.deps.dispatcher.sendFollowUp(quote, followUpType),
      onDelivered: async () => {
        const stampedAt = this.now();
        await this.deps.quotes.update(quoteId, (current) => ({
          ...current,
          lastFollowUpAt: stampedAt,
          updatedAt: stampedAt,
        }));
      },
    });

    logger.withIdentity(requestor).info('[QuoteService] Follow-up queued', { quoteId, followUpType, queued });
    return { recipientEmail, followUpType, queued };
  }

  /**
   * With sharing on, quotes created by any member of the company. With sharing
   * off, a non-staff member sees only their own quotes.
   */
  async listCompanyQuotes(
    companyId: string,
    filters: Pick<ListFilters, 'status'>,
    pagination: Pagination,
    requestor: Identity
  ): Promise<CompanyQuotes> {
    const page = resolvePage(pagination);
    const company = await this.deps.companies.getCompany(companyId);
    if (!company) {
      throw new NotFoundError('Company');
    }
    if (!this.deps.accessGate.canAccessCompany(company, requestor)) {
      throw new ForbiddenError('Access denied');
    }

    const filter: QuoteFilter = { status: filters.status };
    if (!company.quoteSharingEnabled && !isStaff(requestor) && requestor.companyId === company.id) {
      filter.createdBy = requestor.id;
    } else {
      const members = await this.deps.companies.getUsersByCompany(company.id);
      filter.createdByIn = members.map((member) => member.id);
    }

    const quotes = await this.deps.quotes.list(filter, page);
    return {
      companyId: company.id,
      companyName: company.name,
      quoteSharingEnabled: company.quoteSharingEnabled,
      quotes,
      totalCount: quotes.length,
    };
  }

  async getStatusBreakdown(requestor: Identity): Promise<StatusBreakdownEntry[]> {
    return await this.deps.analytics.statusBreakdown(requestor);
  }

  async getAnalyticsSummary(requestor: Identity): Promise<AnalyticsSummary> {
    return await this.deps.analytics.summary(requestor);
  }

  private async loadAccessible(quoteId: string, requestor: Identity): Promise<Quote> {
    const quote = await this.deps.quotes.findById(quoteId);
    if (!quote) {
      throw new NotFoundError('Quote');
    }
    if (!(await this.deps.accessGate.canAccessQuote(quote, requestor))) {
      throw new ForbiddenError('Access denied');
    }
    return quote;
  }

  private async recordCreated(quote: Quote, requestor: Identity, notes: string): Promise<void> {
    await this.deps.audit.recordSafely({
      quoteId: quote.id,
      action: 'created',
      fieldChanged: 'status',
      oldValue: null,
      newValue: quote.status,
      changedBy: requestor.id,
      timestamp: quote.createdAt,
      notes,
    });
  }

  private async markEmailed(quoteId: string, recipientEmail: string): Promise<void> {
    const stampedAt = this.now();
    const previous: { status?: QuoteStatus } = {};

    const updated = await this.deps.quotes.update(quoteId, (current) => {
      previous.status = current.status;
      return {
        ...current,
        status: current.status === 'draft' ? 'sent' : current.status,
        lastEmailedAt: stampedAt,
        updatedAt: stampedAt,
      };
    });

    if (!updated || previous.status === undefined) return;

    await this.deps.audit.recordSafely({
      quoteId,
      action: 'emailed',
      fieldChanged: 'status',
      oldValue: previous.status,
      newValue: updated.status,
      changedBy: 'system',
      timestamp: stampedAt,
      notes: `Quote emailed to ${recipientEmail}`,
    });
  }
}
