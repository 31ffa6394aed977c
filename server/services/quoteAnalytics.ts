/**
 * Quote Analytics
 *
 * Status breakdown and dashboard summary counts. Requires analytics:read.
 * Staff count every quote; anyone else granted the permission counts only
 * the quotes they created.
 */

import { hasPermission, isStaff } from '../../shared/permissions';
import { QUOTE_STATUSES, type Identity, type QuoteStatus, type UserRole } from '../../shared/types';
import { ForbiddenError } from '../errors';
import { logger } from '../logger';
import type { QuoteFilter, QuoteStore, StatusCounts } from '../storage/types';
import type { Clock } from './quoteStateMachine';

export const RECENT_WINDOW_DAYS = 7;

const DAY_MS = 24 * 60 * 60 * 1000;
const PENDING_STATUSES: readonly QuoteStatus[] = ['draft', 'pending'];
const CONVERTED_STATUSES: readonly QuoteStatus[] = ['approved'];

export interface StatusBreakdownEntry {
  status: QuoteStatus;
  count: number;
  /** Share of all counted quotes, 0-100, two decimals */
  percentage: number;
}

export interface AnalyticsSummary {
  totalQuotes: number;
  /** Created within the last RECENT_WINDOW_DAYS */
  recentQuotes: number;
  /** draft or pending */
  pendingQuotes: number;
  convertedQuotes: number;
  conversionRate: number;
  userRole: UserRole;
}

function sumCounts(counts: StatusCounts, statuses: readonly QuoteStatus[] = QUOTE_STATUSES): number {
  return statuses.reduce((total, status) => total + (counts[status] ?? 0), 0);
}

function percentOf(part: number, whole: number): number {
  return whole > 0 ? Math.round((part / whole) * 10000) / 100 : 0;
}

/**
 * Largest count first; equal counts keep lifecycle order. Empty statuses are left out.
 */
export function buildStatusBreakdown(counts: StatusCounts): StatusBreakdownEntry[] {
  const total = sumCounts(counts);
  return QUOTE_STATUSES
    .filter((status) => (counts[status] ?? 0) > 0)
    .map((status) => {
      const count = counts[status] ?? 0;
      return { status, count, percentage: percentOf(count, total) };
    })
    .sort((a, b) => b.count - a.count);
}

export class QuoteAnalytics {
  constructor(
    private readonly quotes: QuoteStore,
    private readonly now: Clock = () => new Date()
  ) { }

  async statusBreakdown(requestor: Identity): Promise<StatusBreakdownEntry[]> {
    const counts = await this.quotes.countByStatus(this.scopeFor(requestor));
    return buildStatusBreakdown(counts);
  }

  async summary(requestor: Identity): Promise<AnalyticsSummary> {
    const scope = this.scopeFor(requestor);
    const since = new Date(this.now().getTime() - RECENT_WINDOW_DAYS * DAY_MS);

    const [all, recent] = await Promise.all([
      this.quotes.countByStatus(scope),
      this.quotes.countByStatus({ ...scope, createdSince: since }),
    ]);

    const totalQuotes = sumCounts(all);
    const convertedQuotes = sumCounts(all, CONVERTED_STATUSES);

    logger.withIdentity(requestor).debug('[QuoteAnalytics] Summary computed', { totalQuotes });

    return {
      totalQuotes,
      recentQuotes: sumCounts(recent),
      pendingQuotes: sumCounts(all, PENDING_STATUSES),
      convertedQuotes,
      conversionRate: percentOf(convertedQuotes, totalQuotes),
      userRole: requestor.role,
    };
  }

  private scopeFor(requestor: Identity): QuoteFilter {
    if (!hasPermission(requestor, 'analytics:read')) {
      throw new ForbiddenError('Insufficient permissions to view analytics');
    }
    return isStaff(requestor) ? {} : { createdBy: requestor.id };
  }
}
