/**
 * INPUT: 環境變數（RANGE_POLICY、OFFER_MIN_AMOUNT 等）
 * OUTPUT: DEFAULT_OFFER_POLICY、loadOfferPolicy()
 * POS: 設定層，定義金額 €200–€5000、期數 6–24 個月與區間處理策略（不可變）
 */

import { RangePolicyMode } from '../models/enums';
import { OfferBounds, OfferPolicy } from '../models/types';

export const DEFAULT_OFFER_BOUNDS: OfferBounds = Object.freeze({
  minAmount: 200,
  maxAmount: 5000,
  minPeriod: 6,
  maxPeriod: 24,
});

/** 預設採夾值策略：極端輸入飽和至最近邊界，不因此拒絕 */
export const DEFAULT_OFFER_POLICY: OfferPolicy = Object.freeze({
  bounds: DEFAULT_OFFER_BOUNDS,
  rangeMode: RangePolicyMode.CLAMP,
});

type Env = Record<string, string | undefined>;

function isRangePolicyMode(val: string): val is RangePolicyMode {
  return (Object.values(RangePolicyMode) as string[]).includes(val);
}

function parseRangeMode(raw: string | undefined): RangePolicyMode {
  if (!raw) return DEFAULT_OFFER_POLICY.rangeMode;
  const mode = raw.trim().toLowerCase();
  if (isRangePolicyMode(mode)) return mode;
  console.warn(
    `[offerPolicy] RANGE_POLICY=${raw} 無法辨識，改用預設 ${DEFAULT_OFFER_POLICY.rangeMode}`,
  );
  return DEFAULT_OFFER_POLICY.rangeMode;
}

function parseBound(env: Env, key: string, fallback: number, integer: boolean): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || (integer && !Number.isInteger(n))) {
    throw new Error(`${key} 必須為${integer ? '整數' : '數字'}，收到 "${raw}"`);
  }
  return n;
}

/** 檢查上下限順序，避免空區間 */
export function createOfferPolicy(
  bounds: OfferBounds,
  rangeMode: RangePolicyMode = DEFAULT_OFFER_POLICY.rangeMode,
): OfferPolicy {
  if (bounds.minAmount > bounds.maxAmount) {
    throw new Error(`金額下限 ${bounds.minAmount} 大於上限 ${bounds.maxAmount}`);
  }
  if (bounds.minPeriod > bounds.maxPeriod) {
    throw new Error(`期數下限 ${bounds.minPeriod} 大於上限 ${bounds.maxPeriod}`);
  }
  if (bounds.minAmount <= 0) {
    throw new Error(`金額下限必須為正數，收到 ${bounds.minAmount}`);
  }
  return Object.freeze({ bounds: Object.freeze({ ...bounds }), rangeMode });
}

/** 由環境變數組出核准參數，未設定者沿用預設 */
export function loadOfferPolicy(env: Env = process.env): OfferPolicy {
  const d = DEFAULT_OFFER_BOUNDS;
  return createOfferPolicy(
    {
      minAmount: parseBound(env, 'OFFER_MIN_AMOUNT', d.minAmount, false),
      maxAmount: parseBound(env, 'OFFER_MAX_AMOUNT', d.maxAmount, false),
      minPeriod: parseBound(env, 'OFFER_MIN_PERIOD', d.minPeriod, true),
      maxPeriod: parseBound(env, 'OFFER_MAX_PERIOD', d.maxPeriod, true),
    },
    parseRangeMode(env['RANGE_POLICY']),
  );
}
