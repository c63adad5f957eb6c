import { Inject, Injectable, Logger } from '@nestjs/common';
import { ClientSession } from 'mongoose';
import { PAYMENT_GATEWAY } from '../../common/constants';
import { PaymentGateway, TransferContext, TransferResult } from './transfer.types';

/**
 * ValueTransferService
 *
 * Single entry point for value leaving marketplace escrow.
 * Makes exactly one delivery attempt. A refusal reported by the gateway comes
 * back as `{ ok: false }` so the caller can pick its fallback (credit ledger
 * for refunds, abort for withdrawals). Anything the gateway throws is
 * rethrown: the gateway may already have written through the session, so the
 * whole operation has to roll back.
 */
@Injectable()
export class ValueTransferService {
  private readonly logger = new Logger(ValueTransferService.name);

  constructor(@Inject(PAYMENT_GATEWAY) private gateway: PaymentGateway) {}

  async send(
    to: string,
    amount: number,
    context: TransferContext,
    session: ClientSession,
  ): Promise<TransferResult> {
    let result: TransferResult;
    try {
      result = await this.gateway.deliver(to, amount, context, session);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(
        `${context.type} ${amount} to ${to} aborted (${context.referenceId}): ${reason}`,
      );
      throw error;
    }

    if (result.ok) {
      this.logger.log(`${context.type} ${amount} delivered to ${to} (${context.referenceId})`);
    } else {
      this.logger.warn(
        `${context.type} ${amount} to ${to} not delivered (${context.referenceId}): ${result.reason}`,
      );
    }

    return result;
  }
}
