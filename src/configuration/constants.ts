/**
 * Canonical keys for platform settings documents.
 *
 * Invariants:
 * - Keys are stable identifiers of documents in `system_variables`; renaming breaks stored data.
 */
export enum SettingsKey {
  Marketplace = "marketplace",
}
