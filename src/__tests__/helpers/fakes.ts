import type { NotificationEvent } from "@/domains/notifications/models/notification.model";
import type { Notifier } from "@/domains/notifications/services/notification.service";
import {
  CreateOrderInput,
  PaymentGateway,
  PaymentGatewayError,
  PaymentOrder,
  RefundInput,
  RefundReceipt,
  RefundStatus,
  SignatureInput,
} from "@/domains/payments/services/payment.gateway";

export const VALID_SIGNATURE = "valid-signature";

export class FakePaymentGateway implements PaymentGateway {
  readonly orders: CreateOrderInput[] = [];
  /** Refunds actually paid out; repeats under a known idempotency key are not added. */
  readonly refunds: RefundInput[] = [];
  refundCalls = 0;
  failOrders = false;
  failRefunds = false;
  /** While set, the gateway accepts refunds without settling them. */
  pendingRefunds = false;
  private readonly receiptsByKey = new Map<string, RefundReceipt>();

  async createOrder(input: CreateOrderInput): Promise<PaymentOrder> {
    if (this.failOrders) {
      throw new PaymentGatewayError("Payment gateway createOrder failed: unavailable", 503);
    }

    this.orders.push(input);
    const orderId = `order_${this.orders.length}`;

    return {
      orderId,
      paymentUrl: `https://checkout.test/pay?order_id=${orderId}`,
      amount: input.amount,
      currency: input.currency,
    };
  }

  async refund(input: RefundInput): Promise<RefundReceipt> {
    this.refundCalls += 1;
    if (this.failRefunds) {
      throw new PaymentGatewayError("Payment gateway refund failed: unavailable", 503);
    }

    const previous = this.receiptsByKey.get(input.idempotencyKey);
    if (previous) {
      const receipt = { ...previous, status: this.refundStatus() };
      this.receiptsByKey.set(input.idempotencyKey, receipt);
      return receipt;
    }

    this.refunds.push(input);
    const receipt = { refundId: `rfnd_${this.refunds.length}`, status: this.refundStatus(), amount: input.amount };
    this.receiptsByKey.set(input.idempotencyKey, receipt);
    return receipt;
  }

  verifySignature(input: SignatureInput): boolean {
    return input.signature === VALID_SIGNATURE;
  }

  private refundStatus(): RefundStatus {
    return this.pendingRefunds ? "pending" : "processed";
  }
}

export interface SentNotification {
  event: NotificationEvent;
  appointmentId: string;
  recipientId: string;
}

export class RecordingNotifier implements Notifier {
  readonly sent: SentNotification[] = [];

  notify(event: NotificationEvent, appointmentId: string, recipientId: string): void {
    this.sent.push({ event, appointmentId, recipientId });
  }

  recipientsOf(event: NotificationEvent): string[] {
    return this.sent.filter((entry) => entry.event === event).map((entry) => entry.recipientId);
  }
}
