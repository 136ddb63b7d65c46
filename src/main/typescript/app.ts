/**
 * INPUT: PurchaseApprovalService、CORS 來源
 * OUTPUT: Express app（核准 API + 健康檢查）
 * POS: 組裝層，整合路由與中介層；index.ts 與 API 測試共用
 */

import express, { Express, NextFunction, Request, Response } from 'express';
import { createEvaluatePurchaseRouter } from './api/evaluatePurchase';
import { PurchaseApprovalService } from './services/purchaseApprovalService';

export const SERVICE_NAME = '分期購物核准服務';

export function createApp(service: PurchaseApprovalService, corsOrigin = '*'): Express {
  const app = express();

  app.use(express.json());

  // 公開 API（允許 CORS 供前端呼叫）
  app.use('/api', (_req, res, next) => {
    res.header('Access-Control-Allow-Origin', corsOrigin);
    res.header('Access-Control-Allow-Headers', 'Content-Type');
    res.header('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    next();
  });
  app.options('/api/*', (_req, res) => res.sendStatus(200));
  app.use('/api', createEvaluatePurchaseRouter(service));

  // 健康檢查
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', service: SERVICE_NAME });
  });

  // JSON 解析失敗 → 400；其餘未預期錯誤 → 500
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ success: false, message: '請求體不是合法的 JSON' });
      return;
    }
    console.error('[app] 未預期錯誤:', err);
    res.status(500).json({ success: false, message: '伺服器內部錯誤' });
  });

  return app;
}
