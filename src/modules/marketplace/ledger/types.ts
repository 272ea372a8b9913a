/**
 * Ledger contract.
 *
 * Purpose: Balances live in a separately owned wallet service; the engine only reaches them
 * through this interface. Every movement carries an idempotency key so a repeated call with
 * the same key is applied at most once by the ledger.
 */

import type { Result } from "@/utils/result";
import type { ResourceId } from "../types";

/**
 * - `insufficient_balance`: definitive rejection, nothing moved.
 * - `rejected`: any other definitive rejection, nothing moved.
 * - `ambiguous`: timeout, cancellation, transport or server failure; the movement may or
 *   may not have been applied.
 */
export type LedgerFailureKind = "insufficient_balance" | "rejected" | "ambiguous";

export class LedgerError extends Error {
  constructor(
    public readonly kind: LedgerFailureKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "LedgerError";
  }
}

export interface LedgerMovement {
  readonly userId: string;
  readonly resource: ResourceId;
  readonly amount: number;
  readonly idempotencyKey: string;
}

export type TransactionDirection = "deposit" | "withdraw";

export interface LedgerTransaction {
  readonly userId: string;
  readonly resource: ResourceId;
  readonly amount: number;
  readonly direction: TransactionDirection;
  readonly relatedEntityType: "buy_request" | "trade" | "feature";
  readonly relatedEntityId: string;
}

export interface LedgerCallOptions {
  readonly signal?: AbortSignal;
}

export interface LedgerService {
  checkBalance(
    userId: string,
    resource: ResourceId,
    amount: number,
    options?: LedgerCallOptions,
  ): Promise<Result<boolean, LedgerError>>;
  getBalance(
    userId: string,
    resource: ResourceId,
    options?: LedgerCallOptions,
  ): Promise<Result<number, LedgerError>>;
  debit(movement: LedgerMovement, options?: LedgerCallOptions): Promise<Result<void, LedgerError>>;
  credit(movement: LedgerMovement, options?: LedgerCallOptions): Promise<Result<void, LedgerError>>;
  /** History entry shown to users; never moves funds. */
  recordTransaction(
    transaction: LedgerTransaction,
    options?: LedgerCallOptions,
  ): Promise<Result<void, LedgerError>>;
}
