/**
 * INPUT: customerId、申請金額、申請期數（以及注入的客戶檔案查詢能力與 OfferPolicy）
 * OUTPUT: PurchaseResponse（核准與否 + 方案條件 + 說明訊息）
 * POS: 服務層，串接區間政策 → 客戶檔案 → 核准分數 → 最高額度 → 最近期數搜尋
 */

import { DenialReason, OfferKind } from '../models/enums';
import {
  LookupProfile,
  OfferPolicy,
  PurchaseDetails,
  PurchaseRequest,
  PurchaseResponse,
} from '../models/types';
import { DEFAULT_OFFER_POLICY } from '../config/offerPolicy';
import { applyRangePolicy } from './purchaseApproval/rangePolicy';
import { isExactMatch } from './purchaseApproval/approvalScorer';
import { calculateMaxAmountForPeriod, isValidAmount } from './purchaseApproval/offerCalculator';
import { findNearestValidOffer } from './purchaseApproval/nearestPeriodSearch';
import { denialMessage, offerMessage } from './purchaseApproval/messages';

export interface PurchaseApprovalService {
  readonly policy: OfferPolicy;
  evaluate(customerId: string, amount: number, period: number): PurchaseResponse;
  evaluatePurchase(request: PurchaseRequest): PurchaseResponse;
}

function approve(kind: OfferKind, details: PurchaseDetails): PurchaseResponse {
  return { approved: true, details, message: offerMessage(kind, details) };
}

function deny(message: string): PurchaseResponse {
  return { approved: false, message };
}

/**
 * 評估分期購物申請
 * - 被拒（reject 策略超出區間、查無客戶、客戶被標記、找不到方案）：approved = false，無 details
 * - 分數 = 1：原申請即為最高額度，照申請核准（金額經夾值者改用最高額度訊息）
 * - 其餘：申請期數的最高額度；不足最低金額時往後找最近期數
 */
export function decidePurchase(
  lookupProfile: LookupProfile,
  policy: OfferPolicy,
  customerId: string,
  amount: number,
  period: number,
): PurchaseResponse {
  const { bounds } = policy;

  const range = applyRangePolicy({ amount, period }, policy);
  if (!range.ok) return deny(range.message);
  const requested = range.details;

  const lookup = lookupProfile(customerId);
  if (!lookup.found) return deny(denialMessage(DenialReason.CUSTOMER_NOT_FOUND, bounds));
  if (lookup.profile.flagged) return deny(denialMessage(DenialReason.CUSTOMER_FLAGGED, bounds));

  const { financialFactor } = lookup.profile;
  if (isExactMatch(financialFactor, requested.amount, requested.period)) {
    // 金額被夾值時，申請人並未申請這個金額
    const kind = requested.amount === amount ? OfferKind.EXACT_MATCH : OfferKind.CAPPED;
    return approve(kind, requested);
  }

  const maxAmount = calculateMaxAmountForPeriod(financialFactor, requested.period, bounds);
  if (isValidAmount(maxAmount, bounds)) {
    return approve(OfferKind.CAPPED, { amount: maxAmount, period: requested.period });
  }

  const nearest = findNearestValidOffer(financialFactor, requested.period, bounds);
  switch (nearest.kind) {
    case 'offer':
      return approve(OfferKind.NEAREST, nearest.details);
    case 'no-offer':
      return deny(denialMessage(DenialReason.NO_VALID_OFFER, bounds));
  }
}

/** 綁定查詢能力與核准參數，供 API 層共用 */
export function createPurchaseApprovalService(
  lookupProfile: LookupProfile,
  policy: OfferPolicy = DEFAULT_OFFER_POLICY,
): PurchaseApprovalService {
  return {
    policy,
    evaluate: (customerId, amount, period) =>
      decidePurchase(lookupProfile, policy, customerId, amount, period),
    evaluatePurchase: (request) =>
      decidePurchase(
        lookupProfile,
        policy,
        request.customerId,
        request.details.amount,
        request.details.period,
      ),
  };
}
