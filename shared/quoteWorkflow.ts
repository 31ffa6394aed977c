/**
 * QUOTE WORKFLOW - Status State Machine Rules
 *
 * States: draft, pending, sent, approved, rejected, expired, archived.
 *
 * The machine does not impose a directed ordering between states: staff may
 * correct mistakes at any stage, so every pair that actually changes the status
 * is legal, except that nothing leaves `archived`.
 *
 * `expired` is a real, storable status but is never entered automatically.
 * isPastExpiry() is advisory (display only) until something calls transition.
 */

import { z } from "zod";
import { QUOTE_STATUSES, type BulkAction, type QuoteStatus } from "./types";

export type { QuoteStatus } from "./types";

// ============================================================================
// STATE DEFINITIONS
// ============================================================================

export const INITIAL_STATUS: QuoteStatus = 'draft';

/**
 * Human-readable labels for logs, notifications and UI
 */
export const STATUS_LABELS: Record<QuoteStatus, string> = {
  draft: 'Draft',
  pending: 'Pending',
  sent: 'Sent',
  approved: 'Approved',
  rejected: 'Rejected',
  expired: 'Expired',
  archived: 'Archived',
};

/**
 * No caller-initiated transition leaves a terminal state
 */
export const TERMINAL_STATES: readonly QuoteStatus[] = ['archived'];

/**
 * Hard deletion is only allowed while a quote is in this status;
 * every other removal is a transition to archived.
 */
export const DELETABLE_STATUS: QuoteStatus = 'draft';
export const DELETE_REQUIRES_DRAFT = 'Can only delete draft quotes';

/**
 * Status written by each status-changing bulk action
 */
export const BULK_ACTION_TARGETS: Record<Exclude<BulkAction, 'delete'>, QuoteStatus> = {
  approve: 'approved',
  reject: 'rejected',
  archive: 'archived',
};

// ============================================================================
// VALIDATION & BUSINESS LOGIC
// ============================================================================

export type TransitionErrorCode = 'FORBIDDEN' | 'SAME_STATUS' | 'TERMINAL_STATE';

export interface TransitionActor {
  isStaff: boolean;
  isCreator: boolean;
}

export interface TransitionResult {
  ok: boolean;
  code?: TransitionErrorCode;
  message?: string;
}

export function isTerminalState(status: QuoteStatus): boolean {
  return TERMINAL_STATES.includes(status);
}

/**
 * Statuses a quote may move to from `from`
 */
export function getAllowedNextStatuses(from: QuoteStatus): QuoteStatus[] {
  if (isTerminalState(from)) return [];
  return QUOTE_STATUSES.filter((status) => status !== from);
}

/**
 * Validates a caller-initiated status change. Checks run in order:
 * authorization, then the no-op rule, then terminal states.
 */
export function validateStatusTransition(
  from: QuoteStatus,
  to: QuoteStatus,
  actor: TransitionActor
): TransitionResult {
  if (!actor.isStaff && !actor.isCreator) {
    return {
      ok: false,
      code: 'FORBIDDEN',
      message: 'Insufficient permissions to change quote status',
    };
  }

  if (from === to) {
    return {
      ok: false,
      code: 'SAME_STATUS',
      message: `Quote is already in ${to} status`,
    };
  }

  if (isTerminalState(from)) {
    return {
      ok: false,
      code: 'TERMINAL_STATE',
      message: `${STATUS_LABELS[from]} quotes cannot change status`,
    };
  }

  return { ok: true };
}

/**
 * Default history note for a status change
 */
export function describeStatusChange(from: QuoteStatus, to: QuoteStatus): string {
  return `Status changed from ${from} to ${to}`;
}

// ============================================================================
// EXPIRY
// ============================================================================

/**
 * Default validity period for quotes (days)
 */
export const DEFAULT_QUOTE_VALIDITY_DAYS = 30;

const DAY_MS = 24 * 60 * 60 * 1000;

export function computeExpiresAt(createdAt: Date, validityDays: number = DEFAULT_QUOTE_VALIDITY_DAYS): Date {
  return new Date(createdAt.getTime() + validityDays * DAY_MS);
}

/**
 * True once expiresAt has passed. Advisory only: the stored status is unchanged.
 */
export function isPastExpiry(expiresAt: Date, now: Date = new Date()): boolean {
  return expiresAt.getTime() < now.getTime();
}

// ============================================================================
// VALIDATION SCHEMAS
// ============================================================================

export const quoteStatusSchema = z.enum(QUOTE_STATUSES);

export const transitionRequestSchema = z.object({
  new_status: quoteStatusSchema,
  admin_notes: z.string().max(1000).optional(),
  notify_customer: z.boolean().optional().default(false),
}).transform((body) => ({
  newStatus: body.new_status,
  notes: body.admin_notes,
  notifyCustomer: body.notify_customer,
}));

export type TransitionRequest = z.infer<typeof transitionRequestSchema>;
