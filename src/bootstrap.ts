/**
 * Default wiring: Mongo repositories, the HTTP ledger client and the cached settings store.
 */

import { loadEnv, settingsStore } from "@/configuration";
import {
  buyRequestRepository,
  catalogStore,
  createMarketplace,
  escrowStore,
  featureLimitationRepository,
  hourlyProfitRepository,
  HttpLedgerClient,
  identityDirectory,
  incidentRepository,
  rateSource,
  sellRequestRepository,
  tradeLedger,
  type MarketplaceService,
} from "@/modules/marketplace";

export function createMarketplaceFromEnv(): MarketplaceService {
  const env = loadEnv();
  const ledger = new HttpLedgerClient({
    baseUrl: env.LEDGER_BASE_URL,
    apiToken: env.LEDGER_API_TOKEN,
    timeoutMs: env.LEDGER_TIMEOUT_MS,
  });

  return createMarketplace({
    ledger,
    catalog: catalogStore,
    rates: rateSource,
    identity: identityDirectory,
    settings: settingsStore,
    escrow: escrowStore,
    trades: tradeLedger,
    buyRequests: buyRequestRepository,
    sellRequests: sellRequestRepository,
    profits: hourlyProfitRepository,
    limitations: featureLimitationRepository,
    incidents: incidentRepository,
  });
}
