/**
 * INPUT: 環境變數（.env）
 * OUTPUT: Express HTTP 伺服器（分期購物核准 API）
 * POS: 應用程式進入點，載入設定、建立客戶檔案庫與核准服務後啟動伺服器
 */

import dotenv from 'dotenv';
dotenv.config();

import { createApp, SERVICE_NAME } from './app';
import { loadOfferPolicy } from './config/offerPolicy';
import { defaultProfileStore } from './config/customerProfileStore';
import { createPurchaseApprovalService } from './services/purchaseApprovalService';

const PORT = Number(process.env.PORT) || 8080;
const CORS_ORIGIN = process.env.CORS_ORIGIN || '*';

const policy = loadOfferPolicy(process.env);
const service = createPurchaseApprovalService(defaultProfileStore.lookupProfile, policy);
const app = createApp(service, CORS_ORIGIN);

app.listen(PORT, () => {
  const { bounds, rangeMode } = policy;
  console.log(`🚀 ${SERVICE_NAME} 啟動成功`);
  console.log(`📡 伺服器運行於 http://localhost:${PORT}`);
  console.log(
    `📐 金額 €${bounds.minAmount}–€${bounds.maxAmount}，期數 ${bounds.minPeriod}–${bounds.maxPeriod} 個月，區間策略 ${rangeMode}`,
  );
  console.log(`👥 已載入 ${defaultProfileStore.size()} 筆客戶檔案`);
});
