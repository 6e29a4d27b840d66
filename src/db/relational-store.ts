/**
 * killfeed Relational Store
 * Typed access to tracked corporations and the static map/type export
 */

import {
  Organization, PersistedOrganization, RegionId, ResultRow, SqlParam,
  INVALID_REGION_ID, isPersisted
} from '../core/types.js';
import { DatabaseConfig } from '../core/config.js';
import { InvalidEntityError, NotConnectedError, NotFoundError, StatementError } from '../core/errors.js';
import { Connector, RelationalConnection, openConnection } from './connection.js';
import { readInteger, readRequiredText, readText, toResultRow } from './values.js';

const ORGANIZATION_COLUMNS = 'id, evecorporationid, lastkillid, lastlossid, name, killcomment, losscomment';

/**
 * Hand-written SQL over a single shared connection.
 *
 * The store takes no locks and opens no transactions. Callers that load an
 * organization, move its cursors and save it again must serialize that cycle
 * per organization themselves, or concurrent saves will overwrite each other.
 */
export class RelationalStore {
  private connection: RelationalConnection | null = null;

  constructor(
    readonly config: DatabaseConfig,
    private readonly connector: Connector = openConnection
  ) {}

  // ============================================================================
  // CONNECTION
  // ============================================================================

  /**
   * Open the connection described by the configuration. There is no automatic
   * reconnect: once dropped, the next operation fails with the driver's error.
   */
  async connect(): Promise<void> {
    this.connection = await this.connector(this.config);
  }

  async close(): Promise<void> {
    const connection = this.connection;
    this.connection = null;
    if (connection) {
      await connection.close();
    }
  }

  get connected(): boolean {
    return this.connection !== null;
  }

  private get conn(): RelationalConnection {
    if (!this.connection) {
      throw new NotConnectedError();
    }
    return this.connection;
  }

  // ============================================================================
  // RAW ACCESS
  // ============================================================================

  /**
   * Run an arbitrary SELECT and return each row keyed by column name. Columns
   * come from the result metadata. A row that cannot be scanned fails the call.
   */
  async rawQuery(sql: string, ...params: SqlParam[]): Promise<ResultRow[]> {
    const result = await this.conn.query(sql, params);
    return result.rows.map((values, i) => toResultRow(result.columns, values, i));
  }

  // ============================================================================
  // ORGANIZATIONS
  // ============================================================================

  /** All tracked organizations, in storage order */
  async loadAllOrganizations(): Promise<PersistedOrganization[]> {
    const rows = await this.rawQuery(`SELECT ${ORGANIZATION_COLUMNS} FROM corporations`);

    const organizations: PersistedOrganization[] = [];
    for (const row of rows) {
      const org = this.rowToOrganization(row);
      org.ignoredRegions = await this.loadIgnoredRegionsForOrganization(org.id);
      organizations.push(org);
    }
    return organizations;
  }

  async loadOrganization(id: number): Promise<PersistedOrganization> {
    const rows = await this.rawQuery(`SELECT ${ORGANIZATION_COLUMNS} FROM corporations WHERE id=?`, id);
    if (rows.length === 0) {
      throw new NotFoundError('Organization', id);
    }

    const org = this.rowToOrganization(rows[0]);
    org.ignoredRegions = await this.loadIgnoredRegionsForOrganization(org.id);
    return org;
  }

  async loadIgnoredRegionsForOrganization(id: number): Promise<RegionId[]> {
    const rows = await this.rawQuery('SELECT regionid FROM ignoredregions WHERE corporationID=?', id);
    return rows.map(row => readInteger(row, 'regionid'));
  }

  /**
   * Insert or update depending on whether the entity already has an ID.
   * The entity is only modified once the write has succeeded.
   */
  async saveOrganization(org: Organization): Promise<PersistedOrganization> {
    if (isPersisted(org)) {
      return this.updateOrganization(org);
    }
    return this.insertOrganization(org);
  }

  /** Insert a new row and write the storage-assigned ID back into `org` */
  async insertOrganization(org: Organization): Promise<PersistedOrganization> {
    if (org.id !== null) {
      throw new InvalidEntityError(`Organization already has ID ${org.id}`, { id: org.id });
    }

    const result = await this.conn.execute(
      'INSERT INTO corporations(evecorporationid, lastkillid, lastlossid) VALUES(?, ?, ?)',
      [org.eveCorporationId, org.lastKillId, org.lastLossId]
    );
    if (result.lastInsertId === null) {
      throw new StatementError('Insert did not report a generated ID', { table: 'corporations' });
    }

    return Object.assign(org, { id: result.lastInsertId });
  }

  /**
   * Write the external ID and both cursors. Name, comments and ignored regions
   * are left alone. An update that matches no row is not an error.
   */
  async updateOrganization(org: PersistedOrganization): Promise<PersistedOrganization> {
    await this.conn.execute(
      'UPDATE corporations SET evecorporationid=?, lastkillid=?, lastlossid=? WHERE id=?',
      [org.eveCorporationId, org.lastKillId, org.lastLossId, org.id]
    );
    return org;
  }

  private rowToOrganization(row: ResultRow): PersistedOrganization {
    return {
      id: readInteger(row, 'id'),
      eveCorporationId: readInteger(row, 'evecorporationid'),
      lastKillId: readInteger(row, 'lastkillid'),
      lastLossId: readInteger(row, 'lastlossid'),
      name: readText(row, 'name'),
      killComment: readText(row, 'killcomment'),
      lossComment: readText(row, 'losscomment'),
      ignoredRegions: []
    };
  }

  // ============================================================================
  // STATIC DATA
  // ============================================================================

  async queryShipName(shipTypeId: number): Promise<string> {
    const rows = await this.rawQuery('SELECT typeName FROM invTypes WHERE typeID=?', shipTypeId);
    if (rows.length === 0) {
      throw new NotFoundError('Ship type', shipTypeId);
    }
    return readRequiredText(rows[0], 'typeName');
  }

  /**
   * Region of a solar system. A miss rejects with a NotFoundError whose
   * `details.regionId` is INVALID_REGION_ID.
   */
  async queryRegionId(solarSystemId: number): Promise<RegionId> {
    const rows = await this.rawQuery('SELECT regionID FROM mapSolarSystems WHERE solarSystemID=?', solarSystemId);
    if (rows.length === 0) {
      throw new NotFoundError('Solar system', solarSystemId, {
        solarSystemId,
        regionId: INVALID_REGION_ID
      });
    }
    return readInteger(rows[0], 'regionID');
  }
}
