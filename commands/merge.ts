import type { CommandConfig } from '../src/cli/command';
import { isLookupTable, type MergeSummary } from '../src/db/taxon-merge';
import { logger } from '../src/helpers/logger';

export default {
  description: 'Merge every loaded taxon table into one table',
  action: async (config, { catalog, env }) => {
    const sources = (
      await catalog.listTables(config.databaseName, env.TAXON_TABLE_PREFIX)
    ).filter((table) => table !== config.tableName && !isLookupTable(table));

    if (sources.length === 0) {
      logger.warn(
        `No ${env.TAXON_TABLE_PREFIX}* tables in ${config.databaseName}, nothing to merge`
      );
      return null;
    }

    logger.info('Start processing to merge tables:', { sources });

    const summary = await catalog.mergeTables(
      config.databaseName,
      sources,
      config.tableName
    );

    logger.success(
      `Merged ${summary.sources.length} tables into ${summary.destination} (${summary.rows} rows)`,
      { created: summary.created }
    );

    return summary;
  },
} satisfies CommandConfig<MergeSummary | null>;
