import { ClientSession } from 'mongoose';
import { LedgerType } from '../../common/enums/ledger-type.enum';

/**
 * Outcome of a bounded-effort outbound transfer
 * A failed delivery is a normal result, not an exception
 */
export type TransferResult = { ok: true } | { ok: false; reason: string };

export type OutboundTransferType =
  | LedgerType.REFUND
  | LedgerType.WITHDRAWAL
  | LedgerType.SALE_PROCEEDS;

export interface TransferContext {
  type: OutboundTransferType;
  referenceId: string;
  description: string;
}

/**
 * Backend that moves value out of the marketplace to an account
 *
 * Implementations make one delivery attempt. A refusal must be reported as
 * `{ ok: false }` before anything is written; a throw aborts the caller's
 * transaction. The recipient controls what happens during delivery, so
 * callers commit their own state first.
 */
export interface PaymentGateway {
  deliver(
    to: string,
    amount: number,
    context: TransferContext,
    session: ClientSession,
  ): Promise<TransferResult>;
}
