import { accessSync, constants, realpathSync, statSync } from 'fs';
import { resolve } from 'path';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import type { TableCatalog } from '../db/taxon-catalog';
import { isLookupTable } from '../db/taxon-merge';
import type { ConnectionSettings } from '../helpers/database';
import { env as currentEnv, getNomenclatures, type Env } from '../helpers/env';
import { FileWarning, UsageError } from '../helpers/errors';
import { logger } from '../helpers/logger';
import { renderHelp } from './help';
import type { Prompter } from './prompter';

export const AUTO = 'auto';
export const DEFAULT_MERGE_TABLE = 'merged_table';

const HELP_CODES = new Set(['commander.helpDisplayed', 'commander.help']);

/**
 * A value that is either given or left for the resolver to decide.
 */
export type Resolvable<T> = { kind: 'auto' } | { kind: 'value'; value: T };

export interface ConnectionOverrides {
  host?: string;
  port?: number;
  user?: string;
}

export interface ParsedArguments {
  table: Resolvable<string>;
  database: Resolvable<string>;
  merge: boolean;
  file?: string;
  connection: ConnectionOverrides;
}

export type ParseOutcome =
  | { kind: 'help'; text: string }
  | { kind: 'arguments'; arguments: ParsedArguments };

export interface ParsedConfig {
  readonly tableName: string;
  readonly databaseName: string;
  readonly merge: boolean;
  readonly filePath?: string;
  readonly connection: Readonly<ConnectionSettings>;
  readonly warnings: readonly FileWarning[];
}

export interface ResolveDependencies {
  catalog: Pick<TableCatalog, 'listTables'>;
  prompter: Prompter;
  env?: Env;
}

type CommandOptions = {
  table: string;
  database: string;
  merge: boolean;
  host?: string;
  user?: string;
  port?: number;
};

function parsePort(value: string): number {
  const port = Number(value);
  if (!/^\d+$/.test(value) || port < 1 || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 1 and 65535.');
  }
  return port;
}

function parseName(value: string): string {
  if (!value.trim()) {
    throw new InvalidArgumentError('Name cannot be empty.');
  }
  return value;
}

function toResolvable(value: string): Resolvable<string> {
  return value === AUTO ? { kind: 'auto' } : { kind: 'value', value };
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('taxon-loader')
    .description(
      'Load Darwin Core taxon checklists into PostgreSQL, or merge loaded checklists into one table.'
    )
    .usage('[options] [file]')
    .argument('[file]', 'tab-separated taxon file to import')
    .option(
      '-t, --table <name>',
      'table name in the database, "auto" asks interactively',
      parseName,
      AUTO
    )
    .option(
      '-d, --database <name>',
      'database name, "auto" uses DB_NAME',
      parseName,
      AUTO
    )
    .option('-m, --merge', 'merge all taxon tables into one', false)
    .option('--host <host>', 'database host (default: DB_HOST)')
    .option('-u, --user <user>', 'database user (default: DB_USER)')
    .option('-p, --port <port>', 'database port (default: DB_PORT)', parsePort)
    .helpOption('-h, --help', 'display this help')
    .allowExcessArguments(false)
    .showSuggestionAfterError(false);

  program.helpInformation = function (this: Command) {
    return renderHelp(this);
  };

  return program;
}

export function usageText(): string {
  return renderHelp(createProgram());
}

/**
 * Parse command-line tokens (without the node/script prefix). Never prints;
 * help and usage text come back to the caller.
 */
export function parseArguments(tokens: readonly string[]): ParseOutcome {
  let stdout = '';
  const program = createProgram()
    .exitOverride()
    .configureOutput({
      writeOut: (text) => {
        stdout += text;
      },
      writeErr: () => {},
    });

  try {
    program.parse([...tokens], { from: 'user' });
  } catch (error) {
    if (!(error instanceof CommanderError)) {
      throw error;
    }

    if (HELP_CODES.has(error.code)) {
      return { kind: 'help', text: stdout };
    }

    throw new UsageError(
      error.message.replace(/^error: /, ''),
      renderHelp(program)
    );
  }

  const options = program.opts<CommandOptions>();
  const [file] = program.args;

  const connection: ConnectionOverrides = {};
  if (options.host !== undefined) connection.host = options.host;
  if (options.port !== undefined) connection.port = options.port;
  if (options.user !== undefined) connection.user = options.user;

  const parsed: ParsedArguments = {
    table: toResolvable(options.table),
    database: toResolvable(options.database),
    merge: options.merge,
    connection,
  };

  if (file !== undefined) {
    parsed.file = file;
  }

  return { kind: 'arguments', arguments: parsed };
}

export function isReadableFile(path: string): boolean {
  try {
    if (!statSync(path).isFile()) {
      return false;
    }
    accessSync(path, constants.R_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Table choices for the interactive prompt. Import mode offers the configured
 * nomenclature tables plus existing prefixed tables; merge mode offers the
 * default destination plus tables outside the source prefix, lookup tables
 * excluded.
 */
export function tableCandidates(
  existingTables: readonly string[],
  merge: boolean,
  config: Env
): { choices: string[]; defaultIndex: number } {
  const prefix = config.TAXON_TABLE_PREFIX;

  if (merge) {
    const choices = unique([
      DEFAULT_MERGE_TABLE,
      ...existingTables.filter(
        (table) => !table.startsWith(prefix) && !isLookupTable(table)
      ),
    ]);
    return { choices, defaultIndex: 0 };
  }

  const choices = unique([
    ...getNomenclatures(config).map((name) => `${prefix}${name.toLowerCase()}`),
    ...existingTables.filter((table) => table.startsWith(prefix)),
  ]);
  return { choices, defaultIndex: choices.length > 1 ? 1 : 0 };
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}

export function resolveDatabaseName(
  parsed: ParsedArguments,
  config: Env = currentEnv
): string {
  return parsed.database.kind === 'value'
    ? parsed.database.value
    : config.DB_NAME;
}

/**
 * Command-line connection flags over the environment defaults.
 */
export function connectionSettings(
  parsed: ParsedArguments,
  databaseName: string,
  config: Env = currentEnv
): ConnectionSettings {
  return {
    host: parsed.connection.host ?? config.DB_HOST,
    port: parsed.connection.port ?? config.DB_PORT,
    user: parsed.connection.user ?? config.DB_USER,
    password: config.DB_PASSWORD,
    database: databaseName,
  };
}

/**
 * Turn parsed arguments into a concrete configuration: fills the database
 * from the environment, asks for a table when none was given and checks the
 * input file. Database errors from the catalog are not caught.
 */
export async function resolveArguments(
  parsed: ParsedArguments,
  deps: ResolveDependencies
): Promise<ParsedConfig> {
  const config = deps.env ?? currentEnv;

  const databaseName = resolveDatabaseName(parsed, config);
  const connection = connectionSettings(parsed, databaseName, config);

  let tableName: string;
  if (parsed.table.kind === 'value') {
    tableName = parsed.table.value;
  } else {
    const existing = await deps.catalog.listTables(databaseName);
    const { choices, defaultIndex } = tableCandidates(
      existing,
      parsed.merge,
      config
    );
    if (choices.length === 0) {
      throw new UsageError(
        'No table to choose from: set NOMENCLATURES or pass --table',
        usageText()
      );
    }
    const question = parsed.merge
      ? 'Please choose the destination table: '
      : 'Please choose your nomenclature: ';
    tableName = await deps.prompter.select(question, choices, defaultIndex);
  }

  const warnings: FileWarning[] = [];
  let filePath: string | undefined;

  if (parsed.file !== undefined) {
    const absolute = resolve(parsed.file);
    if (isReadableFile(absolute)) {
      filePath = realpathSync(absolute);
    } else {
      const warning = new FileWarning(parsed.file);
      warnings.push(warning);
      logger.warn(warning.message);
    }
  }

  const resolved: ParsedConfig = {
    tableName,
    databaseName,
    merge: parsed.merge,
    connection: Object.freeze(connection),
    warnings: Object.freeze(warnings),
    ...(filePath !== undefined ? { filePath } : {}),
  };

  return Object.freeze(resolved);
}
