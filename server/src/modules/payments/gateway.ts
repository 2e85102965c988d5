// src/modules/payments/gateway.ts
/**
 * Client for the hosted-checkout processor (Chapa-style REST API).
 *
 * Every call resolves to a GatewayResult; transport failures, non-2xx answers and
 * bodies that do not parse all come back as `{ status: "error" }`. Callers decide
 * what a failure means for their own records.
 */
import { z } from "zod";

import { logger } from "../../config/logger.js";

export type GatewayResult<T> =
  | { status: "success"; data: T; message: string }
  | { status: "error"; message: string };

export type InitializeRequest = {
  /** decimal string, e.g. "300.00" */
  amount: string;
  currency: string;
  email: string;
  firstName: string;
  lastName: string;
  phone: string;
  txRef: string;
  callbackUrl: string;
  returnUrl: string;
  description: string;
  meta: Record<string, string>;
};

export type InitializeData = { checkoutUrl: string; transactionId: string | null };

export type VerifyData = {
  /** processor's own word, e.g. "success", "pending", "failed" */
  status: string;
  amount: string | null;
  currency: string | null;
};

export type Bank = { id: string; name: string; [k: string]: unknown };

export interface PaymentProcessor {
  initialize(req: InitializeRequest): Promise<GatewayResult<InitializeData>>;
  verify(txRef: string): Promise<GatewayResult<VerifyData>>;
  listBanks(): Promise<GatewayResult<Bank[]>>;
}

export type HttpProcessorOptions = {
  baseUrl: string;
  secretKey: string;
  timeoutMs: number;
};

const idLike = z.union([z.string(), z.number()]).transform(String);
const amountLike = z.union([z.string(), z.number()]).transform(String);

const Envelope = z.object({
  message: z.unknown().optional(),
  status: z.string().optional(),
  data: z.unknown().optional(),
});

const InitializeBody = z.object({
  checkout_url: z.string().url(),
  id: idLike.optional().nullable(),
});

const VerifyBody = z.object({
  status: z.string(),
  amount: amountLike.optional().nullable(),
  currency: z.string().optional().nullable(),
});

const BankList = z.array(z.object({ id: idLike, name: z.string() }).passthrough());

/** Processor messages are usually strings, validation errors come back as objects. */
function messageOf(raw: unknown, fallback: string): string {
  if (typeof raw === "string" && raw.trim()) return raw;
  if (raw && typeof raw === "object") return JSON.stringify(raw);
  return fallback;
}

function describe(err: unknown, timeoutMs: number): string {
  if (err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError")) {
    return `timed out after ${timeoutMs}ms`;
  }
  return err instanceof Error ? err.message : String(err);
}

export function createHttpProcessor(opts: HttpProcessorOptions): PaymentProcessor {
  const base = opts.baseUrl.replace(/\/+$/, "");
  if (!opts.secretKey) logger.warn("payments.secret_key_missing");

  async function call<S extends z.ZodTypeAny>(
    label: string,
    method: "GET" | "POST",
    path: string,
    schema: S,
    body?: unknown
  ): Promise<GatewayResult<z.output<S>>> {
    let res: Response;
    try {
      res = await fetch(`${base}${path}`, {
        method,
        headers: {
          Authorization: `Bearer ${opts.secretKey}`,
          "Content-Type": "application/json",
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(opts.timeoutMs),
      });
    } catch (err) {
      const message = `${label} failed: ${describe(err, opts.timeoutMs)}`;
      logger.error("payments.gateway_unreachable", { path, message });
      return { status: "error", message };
    }

    let json: unknown;
    try {
      json = await res.json();
    } catch (err) {
      const message = `${label} failed: HTTP ${res.status} with unreadable body`;
      logger.error("payments.gateway_bad_body", { path, status: res.status, err: describe(err, opts.timeoutMs) });
      return { status: "error", message };
    }

    const envelope = Envelope.safeParse(json);
    const rawMessage = envelope.success ? envelope.data.message : undefined;

    if (!res.ok) {
      const message = `${label} failed: HTTP ${res.status} ${messageOf(rawMessage, res.statusText)}`.trim();
      logger.error("payments.gateway_rejected", { path, status: res.status, message });
      return { status: "error", message };
    }

    const data = envelope.success ? schema.safeParse(envelope.data.data) : null;
    if (!data?.success) {
      const message = `${label} failed: unexpected response shape`;
      logger.error("payments.gateway_bad_body", { path, status: res.status });
      return { status: "error", message };
    }

    return { status: "success", data: data.data, message: messageOf(rawMessage, `${label} succeeded`) };
  }

  return {
    async initialize(req) {
      const result = await call("Payment initialization", "POST", "/transaction/initialize", InitializeBody, {
        amount: req.amount,
        currency: req.currency,
        email: req.email,
        first_name: req.firstName,
        last_name: req.lastName,
        phone_number: req.phone,
        tx_ref: req.txRef,
        callback_url: req.callbackUrl,
        return_url: req.returnUrl,
        description: req.description,
        meta: req.meta,
      });
      if (result.status === "error") return result;

      logger.info("payments.initialized", { txRef: req.txRef });
      return {
        ...result,
        data: { checkoutUrl: result.data.checkout_url, transactionId: result.data.id ?? null },
      };
    },

    async verify(txRef) {
      const result = await call(
        "Payment verification",
        "GET",
        `/transaction/verify/${encodeURIComponent(txRef)}`,
        VerifyBody
      );
      if (result.status === "error") return result;

      logger.info("payments.verified", { txRef, processorStatus: result.data.status });
      return {
        ...result,
        data: {
          status: result.data.status,
          amount: result.data.amount ?? null,
          currency: result.data.currency ?? null,
        },
      };
    },

    async listBanks() {
      return call("Bank listing", "GET", "/banks", BankList);
    },
  };
}
