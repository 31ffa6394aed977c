/**
 * Discount Engine
 *
 * Applies a percentage or fixed-amount discount to a stored quote's items and
 * records a discount_applied history entry. The arithmetic lives in
 * shared/quotePricing.ts.
 */

import {
  applyDiscountToItems,
  describeDiscount,
  formatAmount,
  type DiscountOutcome,
  type DiscountRequest,
} from '../../shared/quotePricing';
import type { Identity } from '../../shared/types';
import { InvalidArgumentError, NotFoundError } from '../errors';
import { logger } from '../logger';
import type { QuoteStore } from '../storage/types';
import type { AuditTrail } from './auditTrail';
import type { Clock } from './quoteStateMachine';

export interface DiscountResult {
  totalDiscount: number;
  newTotal: number | null;
  itemsAffected: number;
}

export class DiscountEngine {
  constructor(
    private readonly quotes: QuoteStore,
    private readonly audit: AuditTrail,
    private readonly now: Clock = () => new Date()
  ) { }

  async applyDiscount(
    quoteId: string,
    request: DiscountRequest,
    requestor: Identity,
    reason?: string
  ): Promise<DiscountResult> {
    if (!(request.value > 0)) {
      throw new InvalidArgumentError('Discount value must be greater than 0');
    }

    const timestamp = this.now();
    const captured: { oldTotal?: number | null; outcome?: DiscountOutcome } = {};

    const updated = await this.quotes.update(quoteId, (current) => {
      if (current.items.length === 0) {
        throw new InvalidArgumentError('Quote has no items to discount');
      }

      const outcome = applyDiscountToItems(current.items, request);
      captured.oldTotal = current.totalEstimate;
      captured.outcome = outcome;

      return {
        ...current,
        items: outcome.items,
        totalEstimate: outcome.newTotal,
        discountApplied: outcome.totalDiscount,
        discountReason: reason ?? null,
        updatedAt: timestamp,
      };
    });

    const { outcome } = captured;
    if (!updated || !outcome) {
      throw new NotFoundError('Quote');
    }

    await this.audit.recordSafely({
      quoteId,
      action: 'discount_applied',
      fieldChanged: 'items',
      oldValue: `Total: ${formatAmount(captured.oldTotal ?? null)}`,
      newValue: `Total: ${formatAmount(outcome.newTotal)} (Discount: ${outcome.totalDiscount.toFixed(2)})`,
      changedBy: requestor.id,
      timestamp,
      notes: describeDiscount(request.type, request.value, reason),
    });

    logger.withIdentity(requestor).info('[DiscountEngine] Discount applied', {
      quoteId,
      discountType: request.type,
      discountValue: request.value,
      totalDiscount: outcome.totalDiscount,
      itemsAffected: outcome.affectedIndices.length,
    });

    return {
      totalDiscount: outcome.totalDiscount,
      newTotal: outcome.newTotal,
      itemsAffected: outcome.affectedIndices.length,
    };
  }
}
