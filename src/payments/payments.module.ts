import { Module } from '@nestjs/common';
import { PaymentGateway } from './payment-gateway';
import { SandboxPaymentGateway } from './sandbox-payment.gateway';
import { PaymentsService } from './payments.service';
import { RefundSettlementService } from './refund-settlement.service';

@Module({
  providers: [
    {
      provide: PaymentGateway,
      useClass: SandboxPaymentGateway,
    },
    PaymentsService,
    RefundSettlementService,
  ],
  exports: [PaymentsService, RefundSettlementService],
})
export class PaymentsModule {}
