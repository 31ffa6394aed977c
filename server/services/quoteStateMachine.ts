/**
 * Quote State Machine (execution)
 *
 * Applies the rules in shared/quoteWorkflow.ts to stored quotes. Validation
 * runs inside the store's atomic update, so it always sees the current status.
 * The status_changed entry is appended after the update commits, and the
 * optional customer notification is queued last.
 */

import { isStaff } from '../../shared/permissions';
import { describeStatusChange, validateStatusTransition } from '../../shared/quoteWorkflow';
import type { Identity, Quote, QuoteStatus } from '../../shared/types';
import { ForbiddenError, InvalidArgumentError, NoOpTransitionError, NotFoundError } from '../errors';
import { logger } from '../logger';
import type { NotificationDispatcher, QuoteStore } from '../storage/types';
import type { AuditTrail } from './auditTrail';
import type { NotificationQueue } from './notificationQueue';

export type Clock = () => Date;

export interface TransitionOutcome {
  quote: Quote;
  oldStatus: QuoteStatus;
  newStatus: QuoteStatus;
  notificationQueued: boolean;
}

/**
 * Returns the quote moved to `to`, or throws the rule violation.
 * admin_notes is only overwritten for staff requestors that supplied notes.
 */
export function transitionQuote(
  current: Quote,
  to: QuoteStatus,
  requestor: Identity,
  notes: string | undefined,
  now: Date
): Quote {
  const staff = isStaff(requestor);
  const result = validateStatusTransition(current.status, to, {
    isStaff: staff,
    isCreator: current.createdBy === requestor.id,
  });

  if (!result.ok) {
    switch (result.code) {
      case 'FORBIDDEN':
        throw new ForbiddenError(result.message);
      case 'SAME_STATUS':
        throw new NoOpTransitionError(to);
      case 'TERMINAL_STATE':
        throw new InvalidArgumentError(result.message ?? 'Quote cannot change status', 'TERMINAL_STATE');
      default:
        throw new InvalidArgumentError(result.message ?? 'Invalid status transition');
    }
  }

  return {
    ...current,
    status: to,
    updatedAt: now,
    adminNotes: staff && notes ? notes : current.adminNotes,
  };
}

export class QuoteStateMachine {
  constructor(
    private readonly quotes: QuoteStore,
    private readonly audit: AuditTrail,
    private readonly notifications: NotificationQueue,
    private readonly dispatcher: NotificationDispatcher,
    private readonly now: Clock = () => new Date()
  ) { }

  async transition(
    quoteId: string,
    newStatus: QuoteStatus,
    requestor: Identity,
    notes?: string,
    notify: boolean = false
  ): Promise<TransitionOutcome> {
    const timestamp = this.now();
    const previous: { status?: QuoteStatus } = {};

    const updated = await this.quotes.update(quoteId, (current) => {
      previous.status = current.status;
      return transitionQuote(current, newStatus, requestor, notes, timestamp);
    });

    const oldStatus = previous.status;
    if (!updated || oldStatus === undefined) {
      throw new NotFoundError('Quote');
    }

    const noteText = notes || describeStatusChange(oldStatus, newStatus);
    await this.audit.recordSafely({
      quoteId,
      action: 'status_changed',
      fieldChanged: 'status',
      oldValue: oldStatus,
      newValue: newStatus,
      changedBy: requestor.id,
      timestamp,
      notes: noteText,
    });

    logger.withIdentity(requestor).info('[QuoteStateMachine] Status changed', {
      quoteId,
      from: oldStatus,
      to: newStatus,
    });

    const notificationQueued = notify ? this.queueStatusNotification(updated, newStatus, notes ?? null) : false;

    return { quote: updated, oldStatus, newStatus, notificationQueued };
  }

  /**
   * Queues a status-change notification when the customer has an email.
   * Returns whether a job was scheduled.
   */
  queueStatusNotification(quote: Quote, newStatus: QuoteStatus, notes: string | null): boolean {
    if (!quote.customerInfo.email) return false;

    return this.notifications.enqueue({
      kind: 'status_change',
      quoteId: quote.id,
      run: () => this.dispatcher.sendStatusChange(quote, newStatus, notes),
    });
  }
}
