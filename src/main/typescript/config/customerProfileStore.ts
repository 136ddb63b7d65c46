/**
 * INPUT: 客戶編號
 * OUTPUT: createCustomerProfileStore()、defaultProfileStore
 * POS: 設定層，記憶體式客戶風險檔案庫（MVP，後期可替換為資料庫查詢）
 */

import { CustomerProfile, LookupProfile, ProfileLookupResult } from '../models/types';

export interface CustomerProfileStore {
  lookupProfile: LookupProfile;
  size(): number;
}

/** Demo 客戶檔案 */
export const DEMO_CUSTOMER_PROFILES: ReadonlyArray<readonly [string, CustomerProfile]> = [
  ['12345678901', { flagged: true, financialFactor: -1 }], // 不符資格
  ['12345678912', { flagged: false, financialFactor: 50 }],
  ['12345678923', { flagged: false, financialFactor: 100 }],
  ['12345678934', { flagged: false, financialFactor: 500 }],
];

/** 建立唯讀檔案庫；同一編號重複時以後者為準 */
export function createCustomerProfileStore(
  entries: Iterable<readonly [string, CustomerProfile]>,
): CustomerProfileStore {
  const profiles = new Map<string, CustomerProfile>();
  for (const [id, profile] of entries) {
    profiles.set(id, Object.freeze({ ...profile }));
  }

  return {
    lookupProfile(customerId: string): ProfileLookupResult {
      const profile = profiles.get(customerId);
      return profile ? { found: true, profile } : { found: false };
    },
    size: () => profiles.size,
  };
}

export const defaultProfileStore = createCustomerProfileStore(DEMO_CUSTOMER_PROFILES);
