import { RejectionReason } from '../enums/rejection-reason.enum';
import { CustomerId } from '../value-objects/customer-id.vo';
import { SaleAmount } from '../value-objects/sale-amount.vo';

/** An untrusted row as produced by a source, before validation. */
export interface TransactionCandidate {
  customerId?: unknown;
  saleAmount?: unknown;
}

export type TransactionValidationResult =
  | { ok: true; transaction: Transaction }
  | { ok: false; reason: RejectionReason };

export class Transaction {
  readonly customerId: CustomerId;
  readonly saleAmount: SaleAmount;

  constructor(params: { customerId: CustomerId; saleAmount: SaleAmount }) {
    this.customerId = params.customerId;
    this.saleAmount = params.saleAmount;
  }

  static fromCandidate(
    candidate: TransactionCandidate,
  ): TransactionValidationResult {
    if (CustomerId.isMissing(candidate.customerId)) {
      return { ok: false, reason: RejectionReason.MISSING_CUSTOMER_ID };
    }
    if (!CustomerId.isValid(candidate.customerId)) {
      return { ok: false, reason: RejectionReason.INVALID_CUSTOMER_ID };
    }

    const amount = SaleAmount.tryParse(candidate.saleAmount);
    if (!amount.ok) {
      return { ok: false, reason: amount.reason };
    }

    return {
      ok: true,
      transaction: new Transaction({
        customerId: CustomerId.parse(candidate.customerId),
        saleAmount: amount.amount,
      }),
    };
  }
}
