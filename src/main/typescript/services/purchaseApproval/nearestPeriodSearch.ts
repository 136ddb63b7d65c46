/**
 * INPUT: financialFactor、已被拒的申請期數、OfferBounds
 * OUTPUT: OfferResult（最近可行期數的方案，或 no-offer）
 * POS: 服務層，申請期數無法核出合法金額時，往後調整期數尋找方案
 */

import { OfferBounds, OfferResult } from '../../models/types';
import { calculateMaxAmountForPeriod, isValidAmount } from './offerCalculator';

/**
 * 由 period + 1 逐月往後掃描至 maxPeriod，回傳第一個金額落在合法區間的期數。
 * 不回頭考慮較短期數，也不重試原期數；掃描範圍有限，必定終止。
 */
export function findNearestValidOffer(
  financialFactor: number,
  period: number,
  bounds: OfferBounds,
): OfferResult {
  for (let months = period + 1; months <= bounds.maxPeriod; months++) {
    const amount = calculateMaxAmountForPeriod(financialFactor, months, bounds);
    if (isValidAmount(amount, bounds)) {
      return { kind: 'offer', details: { amount, period: months } };
    }
  }
  return { kind: 'no-offer' };
}
