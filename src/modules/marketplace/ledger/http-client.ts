/**
 * HTTP client for the wallet ledger.
 *
 * Wire contract (JSON, camelCase):
 *   GET  /v1/balances/:userId/:resource     -> { balance }
 *   POST /v1/balances/check                 -> { sufficient }
 *   POST /v1/debits, /v1/credits            (Idempotency-Key header)
 *   POST /v1/transactions
 *
 * Status mapping: 2xx ok, 402 insufficient balance, other 4xx rejected, everything else
 * (5xx, timeouts, aborts, socket errors) ambiguous.
 */

import { request, type Dispatcher } from "undici";
import { z } from "zod";
import { ErrResult, OkResult, toError, type Result } from "@/utils/result";
import type { ResourceId } from "../types";
import {
  LedgerError,
  type LedgerCallOptions,
  type LedgerMovement,
  type LedgerService,
  type LedgerTransaction,
} from "./types";

const BalanceResponseSchema = z.object({ balance: z.number().int().nonnegative() });
const CheckResponseSchema = z.object({ sufficient: z.boolean() });

export interface HttpLedgerClientOptions {
  readonly baseUrl: string;
  readonly apiToken?: string;
  readonly timeoutMs: number;
  /** Mainly for tests (undici MockAgent). */
  readonly dispatcher?: Dispatcher;
}

type HttpMethod = "GET" | "POST";

export class HttpLedgerClient implements LedgerService {
  private readonly baseUrl: string;

  constructor(private readonly options: HttpLedgerClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
  }

  async checkBalance(
    userId: string,
    resource: ResourceId,
    amount: number,
    options?: LedgerCallOptions,
  ): Promise<Result<boolean, LedgerError>> {
    const res = await this.send("POST", "/v1/balances/check", { userId, resource, amount }, options);
    if (res.isErr()) return ErrResult(res.error);
    return this.parse(CheckResponseSchema, res.value, "/v1/balances/check").map((body) => body.sufficient);
  }

  async getBalance(
    userId: string,
    resource: ResourceId,
    options?: LedgerCallOptions,
  ): Promise<Result<number, LedgerError>> {
    const path = `/v1/balances/${encodeURIComponent(userId)}/${resource}`;
    const res = await this.send("GET", path, undefined, options);
    if (res.isErr()) return ErrResult(res.error);
    return this.parse(BalanceResponseSchema, res.value, path).map((body) => body.balance);
  }

  async debit(movement: LedgerMovement, options?: LedgerCallOptions): Promise<Result<void, LedgerError>> {
    return this.move("/v1/debits", movement, options);
  }

  async credit(movement: LedgerMovement, options?: LedgerCallOptions): Promise<Result<void, LedgerError>> {
    return this.move("/v1/credits", movement, options);
  }

  async recordTransaction(
    transaction: LedgerTransaction,
    options?: LedgerCallOptions,
  ): Promise<Result<void, LedgerError>> {
    const res = await this.send("POST", "/v1/transactions", transaction, options);
    return res.map(() => undefined);
  }

  private async move(
    path: string,
    movement: LedgerMovement,
    options?: LedgerCallOptions,
  ): Promise<Result<void, LedgerError>> {
    const { idempotencyKey, ...payload } = movement;
    const res = await this.send("POST", path, payload, options, {
      "idempotency-key": idempotencyKey,
    });
    return res.map(() => undefined);
  }

  private parse<T>(
    schema: z.ZodType<T>,
    raw: string,
    path: string,
  ): Result<T, LedgerError> {
    try {
      const parsed = schema.safeParse(JSON.parse(raw));
      if (parsed.success) return OkResult(parsed.data);
      return ErrResult(
        new LedgerError("rejected", `Unexpected response from ${path}: ${parsed.error.message}`),
      );
    } catch (error) {
      return ErrResult(
        new LedgerError("rejected", `Malformed JSON from ${path}`, { cause: toError(error) }),
      );
    }
  }

  private async send(
    method: HttpMethod,
    path: string,
    payload: unknown,
    options?: LedgerCallOptions,
    extraHeaders: Record<string, string> = {},
  ): Promise<Result<string, LedgerError>> {
    const headers: Record<string, string> = { ...extraHeaders };
    if (this.options.apiToken) headers["authorization"] = `Bearer ${this.options.apiToken}`;
    if (payload !== undefined) headers["content-type"] = "application/json";

    let statusCode: number;
    let text: string;
    try {
      const response = await request(`${this.baseUrl}${path}`, {
        method,
        headers,
        body: payload === undefined ? undefined : JSON.stringify(payload),
        signal: options?.signal,
        headersTimeout: this.options.timeoutMs,
        bodyTimeout: this.options.timeoutMs,
        dispatcher: this.options.dispatcher,
      });
      statusCode = response.statusCode;
      text = await response.body.text();
    } catch (error) {
      const cause = toError(error);
      console.warn(`[LedgerClient] ${method} ${path} failed without a response:`, cause.message);
      return ErrResult(
        new LedgerError("ambiguous", `${method} ${path} did not complete: ${cause.message}`, { cause }),
      );
    }

    if (statusCode >= 200 && statusCode < 300) return OkResult(text);
    if (statusCode === 402) {
      return ErrResult(new LedgerError("insufficient_balance", `${method} ${path}: insufficient balance`));
    }
    if (statusCode >= 400 && statusCode < 500) {
      return ErrResult(new LedgerError("rejected", `${method} ${path} returned ${statusCode}: ${text}`));
    }
    console.warn(`[LedgerClient] ${method} ${path} returned ${statusCode}`);
    return ErrResult(new LedgerError("ambiguous", `${method} ${path} returned ${statusCode}`));
  }
}
