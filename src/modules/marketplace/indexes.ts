/**
 * Index bootstrap for every marketplace collection.
 *
 * Run once at startup; `createIndex` is a no-op for indexes that already exist.
 */

import { catalogStore } from "./catalog/repository";
import { escrowStore } from "./escrow/repository";
import { incidentRepository } from "./incidents/repository";
import { featureLimitationRepository } from "./limits/repository";
import { hourlyProfitRepository } from "./profit/repository";
import { buyRequestRepository } from "./requests/buy-repository";
import { sellRequestRepository } from "./requests/sell-repository";
import { tradeLedger } from "./trades/repository";

interface Indexed {
  ensureIndexes(): Promise<void>;
}

const INDEXED: ReadonlyArray<[string, Indexed]> = [
  ["features", catalogStore],
  ["locked_assets", escrowStore],
  ["buy_requests", buyRequestRepository],
  ["sell_requests", sellRequestRepository],
  ["trades", tradeLedger],
  ["hourly_profits", hourlyProfitRepository],
  ["feature_limitations", featureLimitationRepository],
  ["settlement_incidents", incidentRepository],
];

export async function ensureMarketplaceIndexes(): Promise<void> {
  for (const [name, repo] of INDEXED) {
    await repo.ensureIndexes();
    console.log(`[Marketplace] Indexes ready: ${name}`);
  }
}
