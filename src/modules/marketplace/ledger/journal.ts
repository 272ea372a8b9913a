/**
 * Ledger movement journal.
 *
 * Purpose: Remember which ledger movements of one operation were confirmed, so a failed
 * operation can reverse exactly those, newest first. Reversals reuse the original
 * idempotency key with a `:reverse` suffix.
 */

import { ErrResult, OkResult, type Result } from "@/utils/result";
import { reportIncident, type IncidentRepository } from "../incidents/repository";
import { MarketError } from "../types";
import type { LedgerError, LedgerMovement, LedgerService } from "./types";

export type MovementDirection = "debit" | "credit";

export interface AppliedMovement {
  readonly direction: MovementDirection;
  readonly movement: LedgerMovement;
}

export class LedgerJournal {
  private applied: AppliedMovement[] = [];

  constructor(
    private readonly ledger: LedgerService,
    private readonly incidents: IncidentRepository,
    readonly operation: string,
    readonly entityId: string,
    private readonly signal?: AbortSignal,
  ) {}

  get entries(): readonly AppliedMovement[] {
    return this.applied;
  }

  async debit(movement: LedgerMovement): Promise<Result<void, LedgerError>> {
    return this.apply("debit", movement, 1);
  }

  /**
   * Credits are retried on definitive rejections only; an ambiguous outcome returns at once.
   */
  async credit(movement: LedgerMovement, attempts = 1): Promise<Result<void, LedgerError>> {
    return this.apply("credit", movement, attempts);
  }

  /** Records an unknown ledger outcome for manual reconciliation. */
  async flagAmbiguous(
    direction: MovementDirection,
    movement: LedgerMovement,
    error: LedgerError,
  ): Promise<string | undefined> {
    return reportIncident(this.incidents, {
      kind: "ambiguous_ledger",
      operation: `${this.operation}:${direction}`,
      entityId: this.entityId,
      userId: movement.userId,
      resource: movement.resource,
      amount: movement.amount,
      idempotencyKey: movement.idempotencyKey,
      message: error.message,
    });
  }

  /**
   * Reverses every confirmed movement, newest first. The caller's signal is not used here:
   * a cancelled request must still get its money back.
   */
  async compensate(): Promise<Result<number, MarketError>> {
    const pending = [...this.applied].reverse();
    this.applied = [];
    let firstFailure: MarketError | null = null;

    for (const entry of pending) {
      const reverse: LedgerMovement = {
        ...entry.movement,
        idempotencyKey: `${entry.movement.idempotencyKey}:reverse`,
      };
      const res =
        entry.direction === "debit"
          ? await this.ledger.credit(reverse)
          : await this.ledger.debit(reverse);
      if (res.isOk()) continue;

      const incidentId = await reportIncident(this.incidents, {
        kind: "compensation_failed",
        operation: this.operation,
        entityId: this.entityId,
        userId: reverse.userId,
        resource: reverse.resource,
        amount: reverse.amount,
        idempotencyKey: reverse.idempotencyKey,
        message: `Reversing ${entry.direction} failed: ${res.error.message}`,
      });
      firstFailure ??= new MarketError(
        "COMPENSATION_FAILED",
        `Could not reverse ${entry.direction} of ${reverse.amount} ${reverse.resource} for ${reverse.userId}.`,
        { resource: reverse.resource, required: reverse.amount },
        { cause: res.error, incidentId },
      );
    }

    if (firstFailure) return ErrResult(firstFailure);
    return OkResult(pending.length);
  }

  private async apply(
    direction: MovementDirection,
    movement: LedgerMovement,
    attempts: number,
  ): Promise<Result<void, LedgerError>> {
    let last: Result<void, LedgerError> = OkResult(undefined);
    for (let attempt = 1; attempt <= Math.max(1, attempts); attempt += 1) {
      last =
        direction === "debit"
          ? await this.ledger.debit(movement, { signal: this.signal })
          : await this.ledger.credit(movement, { signal: this.signal });
      if (last.isOk()) {
        this.applied.push({ direction, movement });
        return last;
      }
      if (last.error.kind === "ambiguous") return last;
      if (attempt < attempts) {
        console.warn(
          `[Settlement] ${direction} ${movement.idempotencyKey} rejected (attempt ${attempt}/${attempts}), retrying.`,
        );
      }
    }
    return last;
  }
}
