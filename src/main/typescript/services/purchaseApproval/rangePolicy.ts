/**
 * INPUT: 原始 PurchaseDetails、OfferPolicy
 * OUTPUT: RangeCheckResult（合法化後的 details 或拒絕原因）
 * POS: 服務層，唯一接觸原始請求值的入口；下游一律使用合法化後的值
 */

import { DenialReason, RangePolicyMode } from '../../models/enums';
import { OfferPolicy, PurchaseDetails, RangeCheckResult } from '../../models/types';
import { denialMessage } from './messages';

/** NaN 視為最低值，其餘（含 ±Infinity）飽和至最近邊界 */
export function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  return Math.max(Math.min(value, max), min);
}

function inRange(value: number, min: number, max: number): boolean {
  return value >= min && value <= max;
}

/**
 * 套用區間政策
 * - reject：金額先檢，再檢期數，違反即拒絕
 * - clamp：金額夾至 [minAmount, maxAmount]、期數夾至 [minPeriod, maxPeriod]，永不拒絕
 */
export function applyRangePolicy(details: PurchaseDetails, policy: OfferPolicy): RangeCheckResult {
  const { bounds } = policy;

  if (policy.rangeMode === RangePolicyMode.REJECT) {
    if (!inRange(details.amount, bounds.minAmount, bounds.maxAmount)) {
      const reason = DenialReason.AMOUNT_OUT_OF_RANGE;
      return { ok: false, reason, message: denialMessage(reason, bounds) };
    }
    if (!inRange(details.period, bounds.minPeriod, bounds.maxPeriod)) {
      const reason = DenialReason.PERIOD_OUT_OF_RANGE;
      return { ok: false, reason, message: denialMessage(reason, bounds) };
    }
    return { ok: true, details };
  }

  return {
    ok: true,
    details: {
      amount: clamp(details.amount, bounds.minAmount, bounds.maxAmount),
      period: clamp(details.period, bounds.minPeriod, bounds.maxPeriod),
    },
  };
}
