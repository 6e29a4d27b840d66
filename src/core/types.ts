/**
 * killfeed Core Types
 * Domain values shared by the store, the drivers and the CLI.
 */

// ============================================================================
// ORGANIZATIONS
// ============================================================================

/** Region identifier from the static map export */
export type RegionId = number;

/**
 * A tracked in-game corporation.
 *
 * `id` is `null` until the store has persisted the entity; `eveCorporationId`
 * is assigned upstream and never changes once set. The two cursors hold the
 * last kill/loss ID the poller has already posted.
 */
export interface Organization {
  id: number | null;
  eveCorporationId: number;
  lastKillId: number;
  lastLossId: number;
  name: string;
  killComment: string;
  lossComment: string;
  ignoredRegions: RegionId[];
}

/** An organization that carries a storage-assigned ID */
export type PersistedOrganization = Organization & { id: number };

export function isPersisted(org: Organization): org is PersistedOrganization {
  return org.id !== null;
}

/** Fresh, unsaved organization with zeroed cursors */
export function newOrganization(
  eveCorporationId: number,
  cursors: { lastKillId?: number; lastLossId?: number } = {}
): Organization {
  return {
    id: null,
    eveCorporationId,
    lastKillId: cursors.lastKillId ?? 0,
    lastLossId: cursors.lastLossId ?? 0,
    name: '',
    killComment: '',
    lossComment: '',
    ignoredRegions: []
  };
}

/** Returned alongside a failed region lookup; never a real region */
export const INVALID_REGION_ID: RegionId = -1;

// ============================================================================
// SQL VALUES
// ============================================================================

/** Any value a driver may hand back for a single column */
export type SqlValue = string | number | bigint | boolean | Date | Uint8Array | null;

/** Any value the store accepts as a positional `?` parameter */
export type SqlParam = string | number | bigint | boolean | Date | Uint8Array | null;

/** A raw-query row keyed by the column names from the result metadata */
export type ResultRow = Record<string, SqlValue>;
