/**
 * INPUT: financialFactor、期數、OfferBounds
 * OUTPUT: 該期數可核准的最高金額（已套用金額上限）
 * POS: 服務層，最高額度計算與金額合法性判斷
 */

import { OfferBounds } from '../../models/types';

/** 最高額度 = min(financialFactor × period, maxAmount) */
export function calculateMaxAmountForPeriod(
  financialFactor: number,
  period: number,
  bounds: OfferBounds,
): number {
  return Math.min(financialFactor * period, bounds.maxAmount);
}

export function isValidAmount(amount: number, bounds: OfferBounds): boolean {
  return amount >= bounds.minAmount && amount <= bounds.maxAmount;
}
