import type { TaxonCatalog } from '../db/taxon-catalog';
import type { Env } from '../helpers/env';
import type { ParsedConfig } from './arguments';

export interface CommandContext {
  catalog: TaxonCatalog;
  env: Env;
}

export interface CommandConfig<TResult = unknown> {
  description: string;
  action: (config: ParsedConfig, context: CommandContext) => Promise<TResult>;
}
