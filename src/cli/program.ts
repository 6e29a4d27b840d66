/**
 * killfeed CLI Commands
 * Operator commands over the relational store
 */

import { Command, CommanderError } from 'commander';
import { z } from 'zod';
import { RelationalStore } from '../db/relational-store.js';
import { newOrganization } from '../core/types.js';
import { ValidationError } from '../core/errors.js';
import type { Logger } from '../platform/logger.js';
import { formatOrganization, formatOrganizations, formatRow, parseParam } from './format.js';

export interface CliDeps {
  createStore: () => RelationalStore;
  print: (line: string) => void;
  printError: (line: string) => void;
  log: Logger;
}

// ============================================================================
// ARGUMENT VALIDATION
// ============================================================================

const IdSchema = z.coerce.number().int().positive();
const CursorSchema = z.coerce.number().int().nonnegative();

function parseNumber(schema: z.ZodNumber, raw: string, label: string): number {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(`Invalid ${label}: '${raw}'`, { value: raw });
  }
  return result.data;
}

function parseCursor(raw: string | undefined, label: string): number | undefined {
  return raw === undefined ? undefined : parseNumber(CursorSchema, raw, label);
}

interface CursorOptions {
  kill?: string;
  loss?: string;
}

// ============================================================================
// PROGRAM
// ============================================================================

/**
 * Run the CLI against `argv` (node-style, including the executable and script)
 * and resolve with the process exit code.
 */
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  let exitCode = 0;

  // Connect, run, always close
  async function withStore(action: (store: RelationalStore) => Promise<void>): Promise<void> {
    const store = deps.createStore();
    await store.connect();
    try {
      await action(store);
    } finally {
      await store.close();
    }
  }

  // Report a failed command and remember the exit code
  async function guard(fn: () => Promise<void>): Promise<void> {
    try {
      await fn();
    } catch (error) {
      exitCode = 1;
      const message = error instanceof Error ? error.message : String(error);
      deps.printError(`Error: ${message}`);
      deps.log.error({ err: error }, 'Command failed');
    }
  }

  const program = new Command();

  program
    .name('killfeed')
    .description('Inspect and maintain the kill feed database')
    .version('0.1.0')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => deps.print(text.trimEnd()),
      writeErr: (text) => deps.printError(text.trimEnd())
    });

  // ============================================================================
  // ORGANIZATION COMMANDS
  // ============================================================================

  program
    .command('orgs')
    .description('List tracked organizations')
    .action(() => guard(async () => {
      await withStore(async (store) => {
        deps.print(formatOrganizations(await store.loadAllOrganizations()));
      });
    }));

  program
    .command('org')
    .description('Show one organization with its ignored regions')
    .argument('<id>', 'Internal organization ID')
    .action((rawId: string) => guard(async () => {
      const id = parseNumber(IdSchema, rawId, 'organization ID');
      await withStore(async (store) => {
        deps.print(formatOrganization(await store.loadOrganization(id)));
      });
    }));

  program
    .command('add')
    .description('Start tracking a corporation')
    .argument('<eveCorporationId>', 'Corporation ID from the game')
    .option('--kill <id>', 'Initial last kill ID', '0')
    .option('--loss <id>', 'Initial last loss ID', '0')
    .action((rawCorporationId: string, options: CursorOptions) => guard(async () => {
      const eveCorporationId = parseNumber(IdSchema, rawCorporationId, 'corporation ID');
      const org = newOrganization(eveCorporationId, {
        lastKillId: parseCursor(options.kill, 'kill ID'),
        lastLossId: parseCursor(options.loss, 'loss ID')
      });
      await withStore(async (store) => {
        const saved = await store.saveOrganization(org);
        deps.print(`Added organization ${saved.id} for corporation ${saved.eveCorporationId}`);
      });
    }));

  program
    .command('cursor')
    .description('Move the kill and/or loss cursor of an organization')
    .argument('<id>', 'Internal organization ID')
    .option('--kill <id>', 'New last kill ID')
    .option('--loss <id>', 'New last loss ID')
    .action((rawId: string, options: CursorOptions) => guard(async () => {
      const id = parseNumber(IdSchema, rawId, 'organization ID');
      const lastKillId = parseCursor(options.kill, 'kill ID');
      const lastLossId = parseCursor(options.loss, 'loss ID');
      if (lastKillId === undefined && lastLossId === undefined) {
        throw new ValidationError('Nothing to update: pass --kill and/or --loss');
      }

      await withStore(async (store) => {
        const org = await store.loadOrganization(id);
        if (lastKillId !== undefined) org.lastKillId = lastKillId;
        if (lastLossId !== undefined) org.lastLossId = lastLossId;
        const saved = await store.saveOrganization(org);
        deps.print(`Organization ${saved.id}: last kill ${saved.lastKillId}, last loss ${saved.lastLossId}`);
      });
    }));

  // ============================================================================
  // STATIC DATA COMMANDS
  // ============================================================================

  program
    .command('ship')
    .description('Look up a ship name by type ID')
    .argument('<typeId>', 'Ship type ID')
    .action((rawTypeId: string) => guard(async () => {
      const typeId = parseNumber(IdSchema, rawTypeId, 'ship type ID');
      await withStore(async (store) => {
        deps.print(await store.queryShipName(typeId));
      });
    }));

  program
    .command('region')
    .description('Look up the region of a solar system')
    .argument('<solarSystemId>', 'Solar system ID')
    .action((rawSystemId: string) => guard(async () => {
      const solarSystemId = parseNumber(IdSchema, rawSystemId, 'solar system ID');
      await withStore(async (store) => {
        deps.print(String(await store.queryRegionId(solarSystemId)));
      });
    }));

  // ============================================================================
  // RAW QUERY
  // ============================================================================

  program
    .command('query')
    .description('Run a SELECT and print one JSON object per row')
    .argument('<sql>', 'Query text with ? placeholders')
    .argument('[params...]', 'Positional parameters (integers, null, or text)')
    .action((sql: string, params: string[]) => guard(async () => {
      await withStore(async (store) => {
        const rows = await store.rawQuery(sql, ...params.map(parseParam));
        if (rows.length === 0) {
          deps.print('(no rows)');
          return;
        }
        for (const row of rows) {
          deps.print(formatRow(row));
        }
      });
    }));

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  return exitCode;
}
