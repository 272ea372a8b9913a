/**
 * Catalog-side collaborators.
 *
 * The feature catalog, exchange rates and user identity belong to neighbouring services; the
 * engine reads them and writes only ownership and the fields in `FeatureUpdate`.
 */

import type { Result } from "@/utils/result";
import type { FeatureDoc } from "../schema";
import type { FeatureUpdate, ResourceId } from "../types";

export interface CatalogStore {
  getFeature(featureId: string): Promise<Result<FeatureDoc | null, Error>>;
  /**
   * Single conditional write on the current owner: the first writer wins, later ones get
   * null.
   */
  setOwner(
    featureId: string,
    expectedOwnerId: string,
    newOwnerId: string,
  ): Promise<Result<FeatureDoc | null, Error>>;
  updateMarketStatus(featureId: string, update: FeatureUpdate): Promise<Result<FeatureDoc | null, Error>>;
}

export interface RateSource {
  /** IRR value of one unit of the resource. */
  getRate(resource: ResourceId): Promise<Result<number, Error>>;
}

export interface UserProfile {
  readonly userId: string;
  readonly displayName: string;
  readonly isMinor: boolean;
  /** Days between profit withdrawals; settings default applies when unset. */
  readonly withdrawProfitDays?: number;
}

export interface IdentityDirectory {
  getProfile(userId: string): Promise<Result<UserProfile | null, Error>>;
}
