/**
 * INPUT: 無
 * OUTPUT: 區間政策模式、拒絕原因等列舉定義
 * POS: 資料模型層，定義全系統共用的列舉常數
 */

/** 超出區間的請求處理方式 */
export enum RangePolicyMode {
  /** 超出區間即拒絕，並指出違反的邊界 */
  REJECT = 'reject',
  /** 靜默夾至最近的合法邊界後繼續計算 */
  CLAMP = 'clamp',
}

/** 拒絕原因（每一種對應一個固定訊息範本） */
export enum DenialReason {
  AMOUNT_OUT_OF_RANGE = 'AMOUNT_OUT_OF_RANGE',
  PERIOD_OUT_OF_RANGE = 'PERIOD_OUT_OF_RANGE',
  CUSTOMER_NOT_FOUND = 'CUSTOMER_NOT_FOUND',
  CUSTOMER_FLAGGED = 'CUSTOMER_FLAGGED',
  NO_VALID_OFFER = 'NO_VALID_OFFER',
}

/** 核准時的方案性質 */
export enum OfferKind {
  /** 申請金額恰為該期數的最高額度 */
  EXACT_MATCH = 'EXACT_MATCH',
  /** 申請期數下的最高額度（已套用上限） */
  CAPPED = 'CAPPED',
  /** 往後搜尋到的最近可行期數 */
  NEAREST = 'NEAREST',
}
