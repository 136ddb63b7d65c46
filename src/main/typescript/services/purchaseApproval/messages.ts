/**
 * INPUT: DenialReason / OfferKind、OfferBounds、PurchaseDetails
 * OUTPUT: 對外固定訊息字串
 * POS: 服務層，集中管理核准與拒絕訊息範本，呼叫端可依訊息區分原因
 */

import { DenialReason, OfferKind } from '../../models/enums';
import { OfferBounds, PurchaseDetails } from '../../models/types';

export function denialMessage(reason: DenialReason, bounds: OfferBounds): string {
  switch (reason) {
    case DenialReason.AMOUNT_OUT_OF_RANGE:
      return `Requested amount must be between €${bounds.minAmount} and €${bounds.maxAmount}.`;
    case DenialReason.PERIOD_OUT_OF_RANGE:
      return `Requested period must be between ${bounds.minPeriod} and ${bounds.maxPeriod} months.`;
    case DenialReason.CUSTOMER_NOT_FOUND:
      return 'Customer is not found.';
    case DenialReason.CUSTOMER_FLAGGED:
      return 'Customer is flagged.';
    case DenialReason.NO_VALID_OFFER:
      return 'No valid offer found.';
  }
}

export function offerMessage(kind: OfferKind, details: PurchaseDetails): string {
  switch (kind) {
    case OfferKind.EXACT_MATCH:
      return `The maximum available offer is the same as the requested amount €${details.amount}`;
    case OfferKind.CAPPED:
      return `The maximum available offer is €${details.amount}`;
    case OfferKind.NEAREST:
      return `Nearest offer - €${details.amount} in ${details.period} months`;
  }
}
