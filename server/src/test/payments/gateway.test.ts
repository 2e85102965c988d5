import { delay, http, HttpResponse } from "msw";
import { describe, expect, it } from "vitest";

import { createHttpProcessor, type InitializeRequest } from "../../modules/payments/gateway.js";
import { PAYMENT_BASE_URL } from "../msw-handlers.js";
import { mswServer } from "../msw-server.js";

const processor = createHttpProcessor({ baseUrl: PAYMENT_BASE_URL, secretKey: "test-secret", timeoutMs: 200 });

const request: InitializeRequest = {
  amount: "300.00",
  currency: "ETB",
  email: "guest@example.com",
  firstName: "Abebe",
  lastName: "Kebede",
  phone: "",
  txRef: "stay-abc",
  callbackUrl: "http://localhost:3001/webhooks/payments",
  returnUrl: "http://localhost:3001/payment/success",
  description: "Booking payment for Test loft",
  meta: { bookingId: "b1", listingId: "l1" },
};

describe("initialize", () => {
  it("sends the checkout request and returns the hosted link", async () => {
    let seen: { auth: string | null; body: unknown } | null = null;
    mswServer.use(
      http.post(`${PAYMENT_BASE_URL}/transaction/initialize`, async ({ request: req }) => {
        seen = { auth: req.headers.get("authorization"), body: await req.json() };
        return HttpResponse.json({
          message: "Hosted Link",
          status: "success",
          data: { checkout_url: "https://checkout.payments.test/pay/stay-abc" },
        });
      })
    );

    const result = await processor.initialize(request);

    expect(result).toEqual({
      status: "success",
      message: "Hosted Link",
      data: { checkoutUrl: "https://checkout.payments.test/pay/stay-abc", transactionId: null },
    });
    expect(seen).toEqual({
      auth: "Bearer test-secret",
      body: {
        amount: "300.00",
        currency: "ETB",
        email: "guest@example.com",
        first_name: "Abebe",
        last_name: "Kebede",
        phone_number: "",
        tx_ref: "stay-abc",
        callback_url: "http://localhost:3001/webhooks/payments",
        return_url: "http://localhost:3001/payment/success",
        description: "Booking payment for Test loft",
        meta: { bookingId: "b1", listingId: "l1" },
      },
    });
  });

  it("reports a rejected request with the processor's message", async () => {
    mswServer.use(
      http.post(`${PAYMENT_BASE_URL}/transaction/initialize`, () =>
        HttpResponse.json(
          { message: { email: ["The email must be valid"] }, status: "failed", data: null },
          { status: 400 }
        )
      )
    );

    expect(await processor.initialize(request)).toEqual({
      status: "error",
      message: 'Payment initialization failed: HTTP 400 {"email":["The email must be valid"]}',
    });
  });

  it("reports a body that is not JSON", async () => {
    mswServer.use(
      http.post(`${PAYMENT_BASE_URL}/transaction/initialize`, () =>
        new HttpResponse("<html>maintenance</html>", { status: 200, headers: { "Content-Type": "text/html" } })
      )
    );

    expect(await processor.initialize(request)).toEqual({
      status: "error",
      message: "Payment initialization failed: HTTP 200 with unreadable body",
    });
  });

  it("reports JSON of the wrong shape", async () => {
    mswServer.use(
      http.post(`${PAYMENT_BASE_URL}/transaction/initialize`, () =>
        HttpResponse.json({ message: "ok", status: "success", data: { link: "nope" } })
      )
    );

    expect(await processor.initialize(request)).toEqual({
      status: "error",
      message: "Payment initialization failed: unexpected response shape",
    });
  });
});

describe("verify", () => {
  it("normalises the transaction status and amount", async () => {
    mswServer.use(
      http.get(`${PAYMENT_BASE_URL}/transaction/verify/:txRef`, ({ params }) =>
        HttpResponse.json({
          message: "Payment details",
          status: "success",
          data: { status: "success", amount: 300, currency: "ETB", tx_ref: params.txRef, reference: "AP-1" },
        })
      )
    );

    expect(await processor.verify("stay-abc")).toEqual({
      status: "success",
      message: "Payment details",
      data: { status: "success", amount: "300", currency: "ETB" },
    });
  });

  it("gives up after the timeout", async () => {
    mswServer.use(
      http.get(`${PAYMENT_BASE_URL}/transaction/verify/:txRef`, async () => {
        await delay(1_000);
        return HttpResponse.json({ data: { status: "success" } });
      })
    );

    const result = await processor.verify("stay-abc");
    expect(result.status).toBe("error");
    expect(result.message).toMatch(/^Payment verification failed: /);
  });

  it("reports network failures", async () => {
    mswServer.use(http.get(`${PAYMENT_BASE_URL}/transaction/verify/:txRef`, () => HttpResponse.error()));

    const result = await processor.verify("stay-abc");
    expect(result.status).toBe("error");
    expect(result.message).toMatch(/^Payment verification failed: /);
  });
});

describe("listBanks", () => {
  it("returns banks with string ids and keeps extra fields", async () => {
    expect(await processor.listBanks()).toEqual({
      status: "success",
      message: "Banks retrieved",
      data: [
        { id: "130", name: "Test Bank One", acct_length: 13 },
        { id: "b-2", name: "Test Bank Two", acct_length: 10 },
      ],
    });
  });
});
