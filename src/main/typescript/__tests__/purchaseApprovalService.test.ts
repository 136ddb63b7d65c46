/**
 * 測試：purchaseApprovalService — 區間政策 → 客戶檔案 → 分數 → 最高額度 → 最近期數
 */

import {
  createPurchaseApprovalService,
  decidePurchase,
} from '../services/purchaseApprovalService';
import { createOfferPolicy, DEFAULT_OFFER_BOUNDS, DEFAULT_OFFER_POLICY } from '../config/offerPolicy';
import { RangePolicyMode } from '../models/enums';
import { CustomerProfile, LookupProfile, OfferPolicy, PurchaseResponse } from '../models/types';

// ─── Fixture helpers ────────────────────────────────────────────

const CUSTOMER_ID = '12345678923';
const INT_MAX = 2_147_483_647;

const REJECT_POLICY = createOfferPolicy(DEFAULT_OFFER_BOUNDS, RangePolicyMode.REJECT);

function lookupOf(profile: CustomerProfile | null): jest.MockedFunction<LookupProfile> {
  return jest.fn<ReturnType<LookupProfile>, Parameters<LookupProfile>>((_customerId: string) =>
    profile ? { found: true, profile } : { found: false },
  );
}

function evaluateWith(
  profile: CustomerProfile | null,
  amount: number,
  period: number,
  policy: OfferPolicy = DEFAULT_OFFER_POLICY,
): PurchaseResponse {
  return decidePurchase(lookupOf(profile), policy, CUSTOMER_ID, amount, period);
}

function eligible(financialFactor: number): CustomerProfile {
  return { flagged: false, financialFactor };
}

// ─── 客戶檔案 ──────────────────────────────────────────────────

describe('decidePurchase — 客戶檔案', () => {
  test('查無客戶 → 拒絕', () => {
    expect(evaluateWith(null, 1000, 12)).toEqual({
      approved: false,
      message: 'Customer is not found.',
    });
  });

  test('被標記客戶 → 拒絕', () => {
    expect(evaluateWith({ flagged: true, financialFactor: -1 }, 1000, 12)).toEqual({
      approved: false,
      message: 'Customer is flagged.',
    });
  });

  test('被標記客戶即使係數很高仍拒絕', () => {
    const res = evaluateWith({ flagged: true, financialFactor: 500 }, 1000, 12);
    expect(res.approved).toBe(false);
    expect(res.details).toBeUndefined();
    expect(res.message).toBe('Customer is flagged.');
  });

  test('以 customerId 查詢一次', () => {
    const lookup = lookupOf(eligible(100));
    decidePurchase(lookup, DEFAULT_OFFER_POLICY, CUSTOMER_ID, 800, 12);
    expect(lookup).toHaveBeenCalledTimes(1);
    expect(lookup).toHaveBeenCalledWith(CUSTOMER_ID);
  });
});

// ─── 核准分支 ──────────────────────────────────────────────────

describe('decidePurchase — 核准分支（clamp）', () => {
  test('係數 100、€2400 / 24 個月 → 分數 1，照申請核准', () => {
    expect(evaluateWith(eligible(100), 2400, 24)).toEqual({
      approved: true,
      details: { amount: 2400, period: 24 },
      message: 'The maximum available offer is the same as the requested amount €2400',
    });
  });

  test('係數 100、€800 / 12 個月 → 最高額度 €1200', () => {
    expect(evaluateWith(eligible(100), 800, 12)).toEqual({
      approved: true,
      details: { amount: 1200, period: 12 },
      message: 'The maximum available offer is €1200',
    });
  });

  test('係數 500、€4000 / 24 個月 → 12000 上限 €5000', () => {
    expect(evaluateWith(eligible(500), 4000, 24)).toEqual({
      approved: true,
      details: { amount: 5000, period: 24 },
      message: 'The maximum available offer is €5000',
    });
  });

  test('係數 15、€50 / 6 個月 → 金額夾至 200，改為 14 個月 €210', () => {
    expect(evaluateWith(eligible(15), 50, 6)).toEqual({
      approved: true,
      details: { amount: 210, period: 14 },
      message: 'Nearest offer - €210 in 14 months',
    });
  });

  test('係數 5、€1000 / 1 個月 → 期數夾至 6，搜尋 7..24 皆不足 → 拒絕', () => {
    expect(evaluateWith(eligible(5), 1000, 1)).toEqual({
      approved: false,
      message: 'No valid offer found.',
    });
  });

  test('係數 500、整數上限金額與期數 → €5000 / 24 個月', () => {
    expect(evaluateWith(eligible(500), INT_MAX, INT_MAX)).toEqual({
      approved: true,
      details: { amount: 5000, period: 24 },
      message: 'The maximum available offer is €5000',
    });
  });

  test('係數 100、負整數上限金額與期數 → €600 / 6 個月', () => {
    expect(evaluateWith(eligible(100), -INT_MAX, -INT_MAX)).toEqual({
      approved: true,
      details: { amount: 600, period: 6 },
      message: 'The maximum available offer is €600',
    });
  });

  test('夾值後恰為最高額度 → 回傳夾值後的 details，訊息不宣稱為申請金額', () => {
    // €6000 夾至 5000，500 × 10 = 5000
    expect(evaluateWith(eligible(500), 6000, 10)).toEqual({
      approved: true,
      details: { amount: 5000, period: 10 },
      message: 'The maximum available offer is €5000',
    });
  });

  test('係數 100、€2400.000001 / 24 個月 → 略高於最高額度，核准 €2400', () => {
    expect(evaluateWith(eligible(100), 2400.000001, 24)).toEqual({
      approved: true,
      details: { amount: 2400, period: 24 },
      message: 'The maximum available offer is €2400',
    });
  });

  test('係數 100、€2399.999999 / 24 個月 → 略低於最高額度，核准 €2400', () => {
    expect(evaluateWith(eligible(100), 2399.999999, 24)).toEqual({
      approved: true,
      details: { amount: 2400, period: 24 },
      message: 'The maximum available offer is €2400',
    });
  });

  test('financialFactor × period == amount 時一律為 exact match', () => {
    for (let factor = 9; factor <= 250; factor++) {
      for (let period = 6; period <= 24; period++) {
        const amount = factor * period;
        if (amount < 200 || amount > 5000) continue;
        const res = evaluateWith(eligible(factor), amount, period);
        expect(res).toEqual({
          approved: true,
          details: { amount, period },
          message: `The maximum available offer is the same as the requested amount €${amount}`,
        });
      }
    }
  });
});

// ─── reject 策略 ───────────────────────────────────────────────

describe('decidePurchase — reject 策略', () => {
  test('期數 1 → 期數超出區間，不查詢客戶', () => {
    const lookup = lookupOf(eligible(5));
    const res = decidePurchase(lookup, REJECT_POLICY, CUSTOMER_ID, 1000, 1);
    expect(res).toEqual({
      approved: false,
      message: 'Requested period must be between 6 and 24 months.',
    });
    expect(lookup).not.toHaveBeenCalled();
  });

  test('金額 50 → 金額超出區間', () => {
    expect(evaluateWith(eligible(15), 50, 6, REJECT_POLICY)).toEqual({
      approved: false,
      message: 'Requested amount must be between €200 and €5000.',
    });
  });

  test('區間內的請求與 clamp 結果相同', () => {
    expect(evaluateWith(eligible(100), 800, 12, REJECT_POLICY)).toEqual(
      evaluateWith(eligible(100), 800, 12),
    );
  });

  test('係數 5、€1000 / 6 個月 → 拒絕：找不到方案', () => {
    expect(evaluateWith(eligible(5), 1000, 6, REJECT_POLICY)).toEqual({
      approved: false,
      message: 'No valid offer found.',
    });
  });
});

// ─── 自訂區間 ──────────────────────────────────────────────────

describe('decidePurchase — 自訂 OfferPolicy', () => {
  const policy = createOfferPolicy({ minAmount: 1000, maxAmount: 2000, minPeriod: 12, maxPeriod: 36 });

  test('係數 50、€1500 / 12 個月 → 600 不足，改為 20 個月 €1000', () => {
    expect(evaluateWith(eligible(50), 1500, 12, policy)).toEqual({
      approved: true,
      details: { amount: 1000, period: 20 },
      message: 'Nearest offer - €1000 in 20 months',
    });
  });

  test('不同 policy 互不影響', () => {
    evaluateWith(eligible(50), 1500, 12, policy);
    expect(evaluateWith(eligible(100), 800, 12).details).toEqual({ amount: 1200, period: 12 });
  });
});

// ─── 不變式 ────────────────────────────────────────────────────

describe('decidePurchase — 不變式', () => {
  const factors = [-1, 1, 5, 10, 15, 50, 100, 500];
  const amounts = [-1, 50, 200, 1000, 2400, 5000, 9000];
  const periods = [-3, 1, 6, 12, 24, 30];
  const policies: Array<[string, OfferPolicy]> = [
    ['clamp', DEFAULT_OFFER_POLICY],
    ['reject', REJECT_POLICY],
  ];

  test.each(policies)('%s：approved 與 details 同時存在，且 details 落在區間內', (_name, policy) => {
    const { bounds } = policy;
    for (const factor of factors) {
      for (const amount of amounts) {
        for (const period of periods) {
          const res = evaluateWith(eligible(factor), amount, period, policy);
          expect(res.details !== undefined).toBe(res.approved);
          if (res.approved) {
            expect(res.details.amount).toBeGreaterThanOrEqual(bounds.minAmount);
            expect(res.details.amount).toBeLessThanOrEqual(bounds.maxAmount);
            expect(res.details.period).toBeGreaterThanOrEqual(bounds.minPeriod);
            expect(res.details.period).toBeLessThanOrEqual(bounds.maxPeriod);
          }
        }
      }
    }
  });

  test('相同輸入重複呼叫結果相同', () => {
    const first = evaluateWith(eligible(15), 50, 6);
    const second = evaluateWith(eligible(15), 50, 6);
    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
  });

  test('係數 × 期數 > 5000 → 核准金額恰為 5000', () => {
    for (const period of [11, 12, 18, 24]) {
      const res = evaluateWith(eligible(500), 1000, period);
      expect(res.details).toEqual({ amount: 5000, period });
    }
  });
});

// ─── createPurchaseApprovalService ─────────────────────────────

describe('createPurchaseApprovalService', () => {
  test('evaluate 與 evaluatePurchase 結果一致', () => {
    const service = createPurchaseApprovalService(lookupOf(eligible(100)));
    expect(service.evaluatePurchase({ customerId: CUSTOMER_ID, details: { amount: 800, period: 12 } })).toEqual(
      service.evaluate(CUSTOMER_ID, 800, 12),
    );
  });

  test('未指定 policy → 預設 clamp', () => {
    const service = createPurchaseApprovalService(lookupOf(eligible(100)));
    expect(service.policy).toBe(DEFAULT_OFFER_POLICY);
    expect(service.evaluate(CUSTOMER_ID, 50, 1).approved).toBe(true);
  });

  test('指定 reject policy', () => {
    const service = createPurchaseApprovalService(lookupOf(eligible(100)), REJECT_POLICY);
    expect(service.evaluate(CUSTOMER_ID, 50, 1)).toEqual({
      approved: false,
      message: 'Requested amount must be between €200 and €5000.',
    });
  });
});
