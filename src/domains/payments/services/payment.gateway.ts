import axios, { AxiosError, AxiosInstance } from "axios";
import { z } from "zod";
import { createModuleLogger } from "@/shared/config/logger";
import { AppError } from "@/shared/types/common.types";
import { verifyHMACSignature } from "@/shared/utils/crypto";

const moduleLogger = createModuleLogger("PaymentGateway");

export interface CreateOrderInput {
  amount: number;
  currency: string;
  appointmentId: string;
}

export interface PaymentOrder {
  orderId: string;
  paymentUrl: string;
  amount: number;
  currency: string;
}

export interface RefundInput {
  paymentId: string;
  amount: number;
  reason: string;
  /** Repeating a refund with the same key returns the original refund instead of paying out again. */
  idempotencyKey: string;
}

export type RefundStatus = "pending" | "processed";

export interface RefundReceipt {
  refundId: string;
  status: RefundStatus;
  amount: number;
}

export interface SignatureInput {
  orderId: string;
  paymentId: string;
  signature: string;
}

export interface PaymentGateway {
  createOrder(input: CreateOrderInput): Promise<PaymentOrder>;
  refund(input: RefundInput): Promise<RefundReceipt>;
  verifySignature(input: SignatureInput): boolean;
}

export class PaymentGatewayError extends AppError {
  constructor(
    message: string,
    public readonly upstreamStatus: number | null = null
  ) {
    super(message, 502, "PAYMENT_GATEWAY_ERROR");
  }
}

export interface HttpPaymentGatewayOptions {
  baseUrl: string;
  keyId: string;
  keySecret: string;
  checkoutUrl: string;
  timeoutMs: number;
}

const orderResponseSchema = z.object({
  id: z.string(),
  amount: z.number().int(),
  currency: z.string(),
  status: z.string(),
  short_url: z.string().url().optional(),
});

const refundResponseSchema = z.object({
  id: z.string(),
  amount: z.number().int(),
  status: z.enum(["pending", "processed", "failed"]),
});

// Gateway amounts are integers in the currency's minor unit
const toMinorUnits = (amount: number): number => Math.round(amount * 100);
const fromMinorUnits = (amount: number): number => amount / 100;

export const paymentSignaturePayload = (orderId: string, paymentId: string): string => `${orderId}|${paymentId}`;

/**
 * REST client for a Razorpay-style gateway: orders are created before checkout,
 * payments are confirmed by an HMAC signature over `orderId|paymentId` and refunds
 * are issued against the captured payment id.
 */
export class HttpPaymentGateway implements PaymentGateway {
  private readonly client: AxiosInstance;

  constructor(
    private readonly options: HttpPaymentGatewayOptions,
    client?: AxiosInstance
  ) {
    this.client =
      client ??
      axios.create({
        baseURL: options.baseUrl,
        auth: {
          username: options.keyId,
          password: options.keySecret,
        },
        headers: {
          "Content-Type": "application/json",
          Accept: "application/json",
        },
        timeout: options.timeoutMs,
      });

    this.client.interceptors.response.use(
      (response) => response,
      (error: AxiosError) => {
        moduleLogger.error(
          {
            status: error.response?.status,
            method: error.config?.method,
            url: error.config?.url,
            code: error.code,
          },
          "Payment gateway request failed"
        );
        return Promise.reject(error);
      }
    );
  }

  async createOrder(input: CreateOrderInput): Promise<PaymentOrder> {
    const order = await this.call("createOrder", orderResponseSchema, () =>
      this.client.post("/orders", {
        amount: toMinorUnits(input.amount),
        currency: input.currency,
        receipt: input.appointmentId,
        notes: { appointmentId: input.appointmentId },
      })
    );

    moduleLogger.info({ orderId: order.id, appointmentId: input.appointmentId }, "Payment order created");

    return {
      orderId: order.id,
      paymentUrl: order.short_url ?? `${this.options.checkoutUrl}?order_id=${encodeURIComponent(order.id)}`,
      amount: fromMinorUnits(order.amount),
      currency: order.currency,
    };
  }

  async refund(input: RefundInput): Promise<RefundReceipt> {
    const refund = await this.call("refund", refundResponseSchema, () =>
      this.client.post(
        `/payments/${encodeURIComponent(input.paymentId)}/refund`,
        {
          amount: toMinorUnits(input.amount),
          receipt: input.idempotencyKey,
          notes: { reason: input.reason },
        },
        { headers: { "X-Idempotency-Key": input.idempotencyKey } }
      )
    );

    if (refund.status === "failed") {
      throw new PaymentGatewayError(`Refund ${refund.id} was rejected by the gateway`);
    }

    moduleLogger.info({ refundId: refund.id, paymentId: input.paymentId, status: refund.status }, "Refund issued");

    return {
      refundId: refund.id,
      status: refund.status,
      amount: fromMinorUnits(refund.amount),
    };
  }

  verifySignature(input: SignatureInput): boolean {
    return verifyHMACSignature(
      paymentSignaturePayload(input.orderId, input.paymentId),
      input.signature,
      this.options.keySecret
    );
  }

  private async call<T>(
    operation: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    request: () => Promise<{ data: unknown }>
  ): Promise<T> {
    let data: unknown;
    try {
      ({ data } = await request());
    } catch (error) {
      if (axios.isAxiosError(error)) {
        throw new PaymentGatewayError(
          `Payment gateway ${operation} failed: ${error.message}`,
          error.response?.status ?? null
        );
      }
      throw error;
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      moduleLogger.error({ operation, issues: parsed.error.issues }, "Unexpected payment gateway response");
      throw new PaymentGatewayError(`Payment gateway ${operation} returned an unexpected response`);
    }

    return parsed.data;
  }
}
