/**
 * INPUT: POST /api/evaluate-purchase（PurchaseRequest JSON）
 * OUTPUT: { success: true, data: PurchaseResponse }
 * POS: API 層，路由 + 欄位驗證，呼叫 PurchaseApprovalService 執行核准判斷
 *
 * 路由：
 *   POST /api/evaluate-purchase — 評估分期購物申請
 *   GET  /api/offer-policy      — 公開目前的金額/期數區間與區間策略
 */

import { Router, Request, Response } from 'express';
import { PurchaseRequest } from '../models/types';
import { PurchaseApprovalService } from '../services/purchaseApprovalService';

// ─── 欄位驗證輔助 ──────────────────────────────────────────────

function isRecord(val: unknown): val is Record<string, unknown> {
  return typeof val === 'object' && val !== null && !Array.isArray(val);
}

export function validateRequest(
  body: unknown,
): { valid: true; req: PurchaseRequest } | { valid: false; error: string } {
  if (!isRecord(body)) {
    return { valid: false, error: '請求體必須為 JSON 物件' };
  }

  const customerId = body['customerId'];
  if (typeof customerId !== 'string' || customerId.trim() === '') {
    return { valid: false, error: 'customerId 為必填字串' };
  }

  const details = body['details'];
  if (!isRecord(details)) {
    return { valid: false, error: 'details 為必填欄位' };
  }

  const amount = details['amount'];
  if (typeof amount !== 'number' || !Number.isFinite(amount)) {
    return { valid: false, error: 'details.amount 必須為數字（€）' };
  }

  const period = details['period'];
  if (typeof period !== 'number' || !Number.isInteger(period)) {
    return { valid: false, error: 'details.period 必須為整數（月）' };
  }

  return { valid: true, req: { customerId: customerId.trim(), details: { amount, period } } };
}

export function createEvaluatePurchaseRouter(service: PurchaseApprovalService): Router {
  const router = Router();

  // ─── POST /api/evaluate-purchase ──────────────────────────────
  router.post('/evaluate-purchase', (req: Request, res: Response): void => {
    const validation = validateRequest(req.body);
    if (!validation.valid) {
      res.status(400).json({ success: false, message: validation.error });
      return;
    }

    try {
      const result = service.evaluatePurchase(validation.req);
      res.json({ success: true, data: result });
    } catch (err) {
      console.error('[evaluatePurchase] 核准判斷執行錯誤:', err);
      res.status(500).json({
        success: false,
        message: '核准服務異常，請稍後再試',
        error: err instanceof Error ? err.message : String(err),
      });
    }
  });

  // ─── GET /api/offer-policy ────────────────────────────────────
  router.get('/offer-policy', (_req: Request, res: Response) => {
    const { rangeMode, bounds } = service.policy;
    res.json({ success: true, data: { rangeMode, bounds } });
  });

  return router;
}
