/**
 * INPUT: financialFactor、合法化後的金額與期數
 * OUTPUT: 核准分數
 * POS: 服務層，計算客戶能力相對於申請金額的無因次分數
 */

/**
 * 核准分數 = (financialFactor / amount) × period
 * = 1：申請金額恰為該期數的最高額度
 * > 1：申請金額低於最高額度
 * < 1：申請金額高於最高額度
 *
 * amount 由區間政策保證 ≥ 最低金額，不會為 0。
 */
export function calculateApprovalScore(financialFactor: number, amount: number, period: number): number {
  return (financialFactor / amount) * period;
}

/**
 * 分數恰為 1，或 financialFactor × period 恰等於金額。
 * 後者涵蓋除法捨入後得到 0.9999999999999999 的整數係數與期數。
 */
export function isExactMatch(financialFactor: number, amount: number, period: number): boolean {
  return (
    calculateApprovalScore(financialFactor, amount, period) === 1 ||
    financialFactor * period === amount
  );
}
