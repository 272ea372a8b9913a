/**
 * Profit continuity.
 *
 * Purpose: When a feature changes hands its passive income keeps flowing without a gap:
 * income accrued so far is paid to the previous owner, and the same record continues for
 * the new owner from zero.
 */

import { generateId } from "@/utils/ids";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { addDays } from "@/utils/time";
import type { LedgerService } from "../ledger/types";
import type { HourlyProfitDoc } from "../schema";
import type { ColorResource } from "../types";
import type { HourlyProfitRepository } from "./repository";

export interface ProfitTransferInput {
  readonly featureId: string;
  readonly oldOwnerId: string;
  readonly newOwnerId: string;
  /** Color the feature yields; used when the feature has no record yet. */
  readonly resource: ColorResource;
  readonly withdrawDays: number;
}

export interface ProfitTransferOutcome {
  readonly record: HourlyProfitDoc;
  readonly flushedAmount: number;
  readonly created: boolean;
}

export class ProfitContinuityManager {
  constructor(
    private readonly profits: HourlyProfitRepository,
    private readonly ledger: LedgerService,
  ) {}

  async flushAndReassign(input: ProfitTransferInput): Promise<Result<ProfitTransferOutcome, Error>> {
    const now = new Date();
    const deadline = addDays(now, input.withdrawDays);

    const liveRes = await this.profits.findLiveByFeature(input.featureId);
    if (liveRes.isErr()) return ErrResult(liveRes.error);
    const live = liveRes.value;

    if (!live) {
      const created = await this.profits.create({
        _id: generateId("hp"),
        featureId: input.featureId,
        currentHolderId: input.newOwnerId,
        resourceType: input.resource,
        accruedAmount: 0,
        nextWithdrawDeadline: deadline,
        isActive: true,
        version: 0,
        createdAt: now,
        updatedAt: now,
      });
      if (created.isErr()) return ErrResult(created.error);
      return OkResult({ record: created.value, flushedAmount: 0, created: true });
    }

    if (live.currentHolderId !== input.oldOwnerId) {
      console.warn("[ProfitContinuity] Record holder differs from previous owner.", {
        featureId: input.featureId,
        holderId: live.currentHolderId,
        oldOwnerId: input.oldOwnerId,
      });
    }

    let flushedAmount = 0;
    if (live.accruedAmount > 0) {
      // Key bound to the record version: a retried transfer cannot pay the same accrual twice.
      const flush = await this.ledger.credit({
        userId: input.oldOwnerId,
        resource: live.resourceType,
        amount: live.accruedAmount,
        idempotencyKey: `profit-flush:${live._id}:v${live.version}`,
      });
      if (flush.isOk()) {
        flushedAmount = live.accruedAmount;
      } else {
        console.warn("[ProfitContinuity] Failed to flush accrued profit; continuing.", {
          featureId: input.featureId,
          oldOwnerId: input.oldOwnerId,
          amount: live.accruedAmount,
          resource: live.resourceType,
          error: flush.error.message,
        });
      }
    }

    const reassigned = await this.profits.reassign(live._id, live.version, {
      holderId: input.newOwnerId,
      nextWithdrawDeadline: deadline,
    });
    if (reassigned.isErr()) return ErrResult(reassigned.error);
    if (!reassigned.value) {
      return ErrResult(new Error(`Profit record ${live._id} changed during transfer.`));
    }

    return OkResult({ record: reassigned.value, flushedAmount, created: false });
  }
}
