import { Injectable, Logger } from '@nestjs/common';

export const PAYOUT_GATEWAY = Symbol('PAYOUT_GATEWAY');

export interface PayoutRequest {
  userId: string;
  amount: number;
  referenceId: string;
}

/**
 * Moves value out of the platform. The only outbound transfer; a rejected
 * send aborts the withdrawal transaction that called it.
 */
export interface PayoutGateway {
  send(request: PayoutRequest): Promise<void>;
}

// по умолчанию только пишет в лог, реальный провайдер подключается через PAYOUT_GATEWAY
@Injectable()
export class LoggingPayoutGateway implements PayoutGateway {
  private readonly logger = new Logger(LoggingPayoutGateway.name);

  async send(request: PayoutRequest): Promise<void> {
    this.logger.log(
      `Payout of ${request.amount} to user ${request.userId}, reference ${request.referenceId}`,
    );
  }
}
