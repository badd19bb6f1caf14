import axios, { AxiosAdapter, AxiosError, InternalAxiosRequestConfig } from "axios";
import { describe, expect, it } from "vitest";
import { generateHMACSignature } from "@/shared/utils/crypto";
import { HttpPaymentGateway, PaymentGatewayError } from "../services/payment.gateway";

interface RecordedRequest {
  method: string | undefined;
  url: string | undefined;
  body: unknown;
  idempotencyKey: unknown;
}

const options = {
  baseUrl: "https://gateway.test/v1",
  keyId: "test-key",
  keySecret: "test-secret",
  checkoutUrl: "https://checkout.test/pay",
  timeoutMs: 1000,
};

const gatewayReplying = (status: number, data: unknown) => {
  const requests: RecordedRequest[] = [];

  const adapter: AxiosAdapter = async (config: InternalAxiosRequestConfig) => {
    requests.push({
      method: config.method,
      url: config.url,
      body: typeof config.data === "string" ? JSON.parse(config.data) : config.data,
      idempotencyKey: config.headers.get("X-Idempotency-Key"),
    });

    const response = { data, status, statusText: String(status), headers: {}, config };
    if (status >= 400) {
      throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_RESPONSE, config, null, response);
    }
    return response;
  };

  return { gateway: new HttpPaymentGateway(options, axios.create({ adapter })), requests };
};

describe("HttpPaymentGateway", () => {
  describe("createOrder", () => {
    it("sends the amount in minor units and falls back to the checkout page", async () => {
      const { gateway, requests } = gatewayReplying(200, {
        id: "order_A",
        amount: 49950,
        currency: "INR",
        status: "created",
      });

      const order = await gateway.createOrder({ amount: 499.5, currency: "INR", appointmentId: "appointment-1" });

      expect(requests).toEqual([
        {
          method: "post",
          url: "/orders",
          body: {
            amount: 49950,
            currency: "INR",
            receipt: "appointment-1",
            notes: { appointmentId: "appointment-1" },
          },
        },
      ]);
      expect(order).toEqual({
        orderId: "order_A",
        paymentUrl: "https://checkout.test/pay?order_id=order_A",
        amount: 499.5,
        currency: "INR",
      });
    });

    it("prefers the gateway's short link", async () => {
      const { gateway } = gatewayReplying(200, {
        id: "order_A",
        amount: 50000,
        currency: "INR",
        status: "created",
        short_url: "https://pay.test/xyz",
      });

      const order = await gateway.createOrder({ amount: 500, currency: "INR", appointmentId: "appointment-1" });

      expect(order.paymentUrl).toBe("https://pay.test/xyz");
    });

    it("wraps upstream failures", async () => {
      const { gateway } = gatewayReplying(503, { error: "unavailable" });

      const failure = gateway.createOrder({ amount: 500, currency: "INR", appointmentId: "appointment-1" });

      await expect(failure).rejects.toBeInstanceOf(PaymentGatewayError);
      await expect(failure).rejects.toMatchObject({
        message: "Payment gateway createOrder failed: Request failed with status code 503",
        upstreamStatus: 503,
        statusCode: 502,
        code: "PAYMENT_GATEWAY_ERROR",
      });
    });

    it("rejects a response of the wrong shape", async () => {
      const { gateway } = gatewayReplying(200, { id: 42 });

      await expect(
        gateway.createOrder({ amount: 500, currency: "INR", appointmentId: "appointment-1" })
      ).rejects.toThrow("Payment gateway createOrder returned an unexpected response");
    });
  });

  describe("refund", () => {
    it("refunds against the captured payment", async () => {
      const { gateway, requests } = gatewayReplying(200, { id: "rfnd_A", amount: 50000, status: "processed" });

      const receipt = await gateway.refund({
        paymentId: "pay_1",
        amount: 500,
        reason: "patient_request",
        idempotencyKey: "refund_appointment-1",
      });

      expect(requests[0]).toEqual({
        method: "post",
        url: "/payments/pay_1/refund",
        body: { amount: 50000, receipt: "refund_appointment-1", notes: { reason: "patient_request" } },
        idempotencyKey: "refund_appointment-1",
      });
      expect(receipt).toEqual({ refundId: "rfnd_A", status: "processed", amount: 500 });
    });

    it("treats a failed refund as an error", async () => {
      const { gateway } = gatewayReplying(200, { id: "rfnd_A", amount: 50000, status: "failed" });

      await expect(gateway.refund({ paymentId: "pay_1", amount: 500, reason: "other", idempotencyKey: "refund_1" })).rejects.toThrow(
        "Refund rfnd_A was rejected by the gateway"
      );
    });
  });

  describe("verifySignature", () => {
    const { gateway } = gatewayReplying(200, {});

    it("accepts the HMAC of order and payment id", () => {
      const signature = generateHMACSignature("order_A|pay_1", "test-secret");

      expect(gateway.verifySignature({ orderId: "order_A", paymentId: "pay_1", signature })).toBe(true);
    });

    it("rejects a signature for another payment", () => {
      const signature = generateHMACSignature("order_A|pay_2", "test-secret");

      expect(gateway.verifySignature({ orderId: "order_A", paymentId: "pay_1", signature })).toBe(false);
      expect(gateway.verifySignature({ orderId: "order_A", paymentId: "pay_1", signature: "short" })).toBe(false);
    });
  });
});
