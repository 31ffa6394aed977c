/**
 * Bulk Quote Actions
 *
 * approve / reject / archive / delete across up to MAX_BULK_QUOTES quotes.
 * Items are processed one at a time in input order; a failing item is
 * reported in `failed` and never stops the rest of the batch.
 */

import { isStaff } from '../../shared/permissions';
import { BULK_ACTION_TARGETS, DELETABLE_STATUS, DELETE_REQUIRES_DRAFT } from '../../shared/quoteWorkflow';
import { MAX_BULK_QUOTES } from '../../shared/schema';
import type { BulkAction, Identity, QuoteStatus } from '../../shared/types';
import { ForbiddenError, InvalidArgumentError, isQuoteDeskError } from '../errors';
import { logger } from '../logger';
import type { QuoteStore } from '../storage/types';
import type { AuditTrail } from './auditTrail';
import { transitionQuote, type Clock, type QuoteStateMachine } from './quoteStateMachine';

export interface BulkProcessedEntry {
  quoteId: string;
  action: BulkAction;
  oldStatus: QuoteStatus;
  newStatus: QuoteStatus | 'deleted';
}

export interface BulkFailedEntry {
  quoteId: string;
  reason: string;
}

export interface BulkResult {
  action: BulkAction;
  processed: BulkProcessedEntry[];
  failed: BulkFailedEntry[];
}

export interface BulkRequest {
  quoteIds: readonly string[];
  action: BulkAction;
  notes?: string;
  notifyCustomers?: boolean;
}

type ItemOutcome = { ok: true; entry: BulkProcessedEntry } | { ok: false; reason: string };

const NOT_FOUND = 'Quote not found';
const PROCESSING_ERROR = 'Processing error';

export class BulkQuoteActions {
  constructor(
    private readonly quotes: QuoteStore,
    private readonly audit: AuditTrail,
    private readonly stateMachine: QuoteStateMachine,
    private readonly now: Clock = () => new Date()
  ) { }

  async applyBulk(request: BulkRequest, requestor: Identity): Promise<BulkResult> {
    if (!isStaff(requestor)) {
      throw new ForbiddenError('Only admins and managers can run bulk actions');
    }
    if (request.quoteIds.length === 0) {
      throw new InvalidArgumentError('At least one quote id is required');
    }
    if (request.quoteIds.length > MAX_BULK_QUOTES) {
      throw new InvalidArgumentError(`Bulk actions are limited to ${MAX_BULK_QUOTES} quotes`);
    }

    const log = logger.withIdentity(requestor);
    const result: BulkResult = { action: request.action, processed: [], failed: [] };

    for (const quoteId of request.quoteIds) {
      let outcome: ItemOutcome;
      try {
        outcome = await this.processItem(quoteId, request, requestor);
      } catch (error) {
        if (isQuoteDeskError(error)) {
          outcome = { ok: false, reason: error.message };
        } else {
          log.error('[BulkQuoteActions] Error processing quote', { quoteId, action: request.action, error });
          outcome = { ok: false, reason: PROCESSING_ERROR };
        }
      }

      if (outcome.ok) {
        result.processed.push(outcome.entry);
      } else {
        result.failed.push({ quoteId, reason: outcome.reason });
      }
    }

    log.info(`[BulkQuoteActions] Bulk ${request.action} completed`, {
      processed: result.processed.length,
      failed: result.failed.length,
    });

    return result;
  }

  private async processItem(quoteId: string, request: BulkRequest, requestor: Identity): Promise<ItemOutcome> {
    if (request.action === 'delete') {
      return await this.deleteDraft(quoteId, requestor, request.notes);
    }

    const action = request.action;
    const target = BULK_ACTION_TARGETS[action];
    const timestamp = this.now();
    const previous: { status?: QuoteStatus } = {};

    const updated = await this.quotes.update(quoteId, (current) => {
      previous.status = current.status;

      if (action === 'archive') {
        return {
          ...current,
          status: target,
          updatedAt: timestamp,
          adminNotes: request.notes ?? current.adminNotes,
        };
      }

      if (current.status === target) {
        throw new InvalidArgumentError(`Quote is already ${target}`);
      }
      return transitionQuote(current, target, requestor, request.notes, timestamp);
    });

    const oldStatus = previous.status;
    if (!updated || oldStatus === undefined) {
      return { ok: false, reason: NOT_FOUND };
    }

    await this.audit.recordSafely({
      quoteId,
      action: `bulk_${action}`,
      fieldChanged: 'status',
      oldValue: oldStatus,
      newValue: target,
      changedBy: requestor.id,
      timestamp,
      notes: request.notes || `Bulk ${action} action`,
    });

    if (request.notifyCustomers && action !== 'archive') {
      this.stateMachine.queueStatusNotification(updated, target, request.notes ?? null);
    }

    return { ok: true, entry: { quoteId, action, oldStatus, newStatus: target } };
  }

  private async deleteDraft(quoteId: string, requestor: Identity, notes: string | undefined): Promise<ItemOutcome> {
    const quote = await this.quotes.findById(quoteId);
    if (!quote) {
      return { ok: false, reason: NOT_FOUND };
    }
    if (quote.status !== DELETABLE_STATUS) {
      return { ok: false, reason: DELETE_REQUIRES_DRAFT };
    }

    // Conditional on status: a transition committed since the read wins
    const deleted = await this.quotes.delete(quoteId, DELETABLE_STATUS);
    if (!deleted) {
      const current = await this.quotes.findById(quoteId);
      return { ok: false, reason: current ? DELETE_REQUIRES_DRAFT : NOT_FOUND };
    }

    await this.audit.recordSafely({
      quoteId,
      action: 'bulk_delete',
      fieldChanged: 'status',
      oldValue: quote.status,
      newValue: 'deleted',
      changedBy: requestor.id,
      timestamp: this.now(),
      notes: notes || 'Bulk delete action',
    });

    return { ok: true, entry: { quoteId, action: 'delete', oldStatus: quote.status, newStatus: 'deleted' } };
  }
}
