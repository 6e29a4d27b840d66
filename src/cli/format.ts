/**
 * killfeed CLI Formatting
 * Plain-text output for the operator commands
 */

import { PersistedOrganization, ResultRow, SqlParam, SqlValue } from '../core/types.js';

const EMPTY = '—';

// ============================================================================
// ORGANIZATIONS
// ============================================================================

export function formatOrganizations(orgs: PersistedOrganization[]): string {
  if (orgs.length === 0) {
    return 'No organizations tracked.';
  }

  const header = 'ID'.padEnd(6) + 'CORP ID'.padEnd(12) + 'LAST KILL'.padEnd(12)
    + 'LAST LOSS'.padEnd(12) + 'IGNORED'.padEnd(9) + 'NAME';

  const lines = orgs.map(org =>
    String(org.id).padEnd(6)
    + String(org.eveCorporationId).padEnd(12)
    + String(org.lastKillId).padEnd(12)
    + String(org.lastLossId).padEnd(12)
    + String(org.ignoredRegions.length).padEnd(9)
    + (org.name || EMPTY)
  );

  return [header, ...lines].join('\n');
}

export function formatOrganization(org: PersistedOrganization): string {
  const regions = org.ignoredRegions.length > 0
    ? [...org.ignoredRegions].sort((a, b) => a - b).join(', ')
    : 'none';

  return [
    `Organization ${org.id}`,
    `  Corporation ID:  ${org.eveCorporationId}`,
    `  Name:            ${org.name || EMPTY}`,
    `  Last kill ID:    ${org.lastKillId}`,
    `  Last loss ID:    ${org.lastLossId}`,
    `  Kill comment:    ${org.killComment || EMPTY}`,
    `  Loss comment:    ${org.lossComment || EMPTY}`,
    `  Ignored regions: ${regions}`
  ].join('\n');
}

// ============================================================================
// RAW ROWS
// ============================================================================

function plainValue(value: SqlValue): string | number | boolean | null {
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Date) return value.toISOString();
  if (value instanceof Uint8Array) return Buffer.from(value).toString('hex');
  return value;
}

/** One JSON object per row; dates as ISO strings, blobs as hex */
export function formatRow(row: ResultRow): string {
  const plain = Object.fromEntries(
    Object.entries(row).map(([column, value]) => [column, plainValue(value)])
  );
  return JSON.stringify(plain);
}

/**
 * Interpret a command-line query parameter: integers become numbers, the bare
 * word `null` becomes NULL, anything else stays a string.
 */
export function parseParam(raw: string): SqlParam {
  if (raw === 'null') return null;
  if (/^-?\d+$/.test(raw)) {
    const value = Number(raw);
    return Number.isSafeInteger(value) ? value : BigInt(raw);
  }
  return raw;
}
