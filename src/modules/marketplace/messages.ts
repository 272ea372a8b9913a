/**
 * User-facing text for marketplace errors.
 *
 * Validation, balance and cooldown errors explain themselves; anything that needs an
 * operator gets a generic message and the incident id when there is one.
 */

import type { MarketError } from "./types";

const GENERIC = "Something went wrong while settling this trade. Try again later or contact support.";

export function formatDuration(ms: number): string {
  const totalMinutes = Math.max(1, Math.ceil(ms / 60_000));
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  if (hours === 0) return `${minutes}m`;
  return minutes === 0 ? `${hours}h` : `${hours}h ${minutes}m`;
}

export function describeMarketError(error: MarketError): string {
  const { details } = error;
  switch (error.code) {
    case "INSUFFICIENT_BALANCE": {
      const available = details.available === undefined ? "" : `, available ${details.available}`;
      return `Insufficient ${details.resource ?? "balance"}: required ${details.required ?? "?"}${available}.`;
    }
    case "PRICE_BELOW_FLOOR":
      return `The price must be at least ${details.floorPercentage ?? "?"}% of the feature value.`;
    case "UNDERPRICED_COOLDOWN_ACTIVE":
      return `You sold a feature below value recently. You can sell again in ${formatDuration(details.remainingMs ?? 0)}.`;
    case "AMBIGUOUS_LEDGER_FAILURE":
    case "COMPENSATION_FAILED":
    case "STORAGE_FAILURE":
    case "OWNERSHIP_CONFLICT":
    case "DUPLICATE_LOCK":
    case "LEDGER_REJECTED":
    case "LEDGER_UNAVAILABLE":
      return error.incidentId ? `${GENERIC} (reference: ${error.incidentId})` : GENERIC;
    default:
      return error.message;
  }
}
