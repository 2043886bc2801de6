import chalk from 'chalk';
import importCommand from '../../commands/import';
import mergeCommand from '../../commands/merge';
import { createDatabaseFactory, TaxonCatalog } from '../db/taxon-catalog';
import { env as currentEnv, type Env } from '../helpers/env';
import { PromptAbortedError, UsageError } from '../helpers/errors';
import { logger } from '../helpers/logger';
import {
  connectionSettings,
  parseArguments,
  resolveArguments,
  resolveDatabaseName,
  usageText,
  type ParsedArguments,
} from './arguments';
import type { CommandConfig } from './command';
import { ReadlinePrompter, type Prompter } from './prompter';

export interface RunDependencies {
  env?: Env;
  prompter?: Prompter;
  createCatalog?: (parsed: ParsedArguments, env: Env) => TaxonCatalog;
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
}

export const commands: Record<'import' | 'merge', CommandConfig> = {
  import: importCommand,
  merge: mergeCommand,
};

function defaultCatalog(parsed: ParsedArguments, config: Env): TaxonCatalog {
  const settings = connectionSettings(
    parsed,
    resolveDatabaseName(parsed, config),
    config
  );
  return new TaxonCatalog(
    createDatabaseFactory(settings, config.DATABASE_URL),
    config.ADMIN_DB_NAME
  );
}

function printUsageError(error: UsageError, stderr: NodeJS.WritableStream): void {
  stderr.write(`${chalk.red('error:')} ${error.message}\n\n`);
  stderr.write(error.usage || usageText());
}

/**
 * Parse, resolve, then hand off to the import or merge workflow.
 * Resolves to the process exit code.
 */
export async function run(
  argv: readonly string[],
  deps: RunDependencies = {}
): Promise<number> {
  const config = deps.env ?? currentEnv;
  const stdout = deps.stdout ?? process.stdout;
  const stderr = deps.stderr ?? process.stderr;

  let parsed: ParsedArguments;
  try {
    const outcome = parseArguments(argv);
    if (outcome.kind === 'help') {
      stdout.write(outcome.text);
      return 0;
    }
    parsed = outcome.arguments;
  } catch (error) {
    if (error instanceof UsageError) {
      printUsageError(error, stderr);
      return error.exitCode;
    }
    throw error;
  }

  const catalog = (deps.createCatalog ?? defaultCatalog)(parsed, config);

  try {
    const resolved = await resolveArguments(parsed, {
      catalog,
      prompter: deps.prompter ?? new ReadlinePrompter(),
      env: config,
    });

    const command = resolved.merge ? commands.merge : commands.import;
    await command.action(resolved, { catalog, env: config });
    return 0;
  } catch (error) {
    if (error instanceof UsageError) {
      printUsageError(error, stderr);
      return error.exitCode;
    }
    if (error instanceof PromptAbortedError) {
      logger.error(error.message);
      return 1;
    }
    throw error;
  } finally {
    await catalog.close();
  }
}
