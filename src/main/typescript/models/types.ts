/**
 * INPUT: enums.ts（RangePolicyMode, DenialReason）
 * OUTPUT: CustomerProfile, PurchaseDetails, PurchaseRequest, PurchaseResponse 與各種標記結果型別
 * POS: 資料模型層，定義分期購物核准流程共用的 TypeScript 介面
 */

import { DenialReason, RangePolicyMode } from './enums';

/** 客戶風險檔案（由外部檔案庫擁有，核准流程只讀取） */
export interface CustomerProfile {
  readonly flagged: boolean;
  /** 每月可融資能力係數；被標記客戶可能為 -1 等哨兵值，不可由正負號推斷資格 */
  readonly financialFactor: number;
}

/** 金額（€）與期數（月），可為申請內容或反提案 */
export interface PurchaseDetails {
  readonly amount: number;
  readonly period: number;
}

export interface PurchaseRequest {
  readonly customerId: string;
  readonly details: PurchaseDetails;
}

/** 核准結果：details 僅在 approved = true 時存在 */
export type PurchaseResponse =
  | { readonly approved: true; readonly details: PurchaseDetails; readonly message: string }
  | { readonly approved: false; readonly details?: undefined; readonly message: string };

/** 客戶檔案查詢結果 */
export type ProfileLookupResult =
  | { readonly found: true; readonly profile: CustomerProfile }
  | { readonly found: false };

/** 外部客戶檔案查詢能力 */
export type LookupProfile = (customerId: string) => ProfileLookupResult;

/** 方案計算結果 */
export type OfferResult =
  | { readonly kind: 'offer'; readonly details: PurchaseDetails }
  | { readonly kind: 'no-offer' };

/** 區間政策檢核結果 */
export type RangeCheckResult =
  | { readonly ok: true; readonly details: PurchaseDetails }
  | { readonly ok: false; readonly reason: DenialReason; readonly message: string };

/** 金額與期數的合法區間 */
export interface OfferBounds {
  readonly minAmount: number;
  readonly maxAmount: number;
  readonly minPeriod: number;
  readonly maxPeriod: number;
}

/** 一條產品線的核准參數 */
export interface OfferPolicy {
  readonly bounds: OfferBounds;
  readonly rangeMode: RangePolicyMode;
}
