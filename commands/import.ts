import { performance } from 'perf_hooks';
import type { CommandConfig } from '../src/cli/command';
import { UsageError } from '../src/helpers/errors';
import { logger } from '../src/helpers/logger';
import { TaxonTreeBuilder } from '../src/taxonomy/builder';
import { TaxonImporter, type ImportSummary } from '../src/taxonomy/importer';
import { readTaxonRows } from '../src/taxonomy/reader';

export default {
  description: 'Build the taxon tree from a checklist file and store it in a table',
  action: async (config, { catalog, env }) => {
    if (!config.filePath) {
      throw new UsageError('No input file to import');
    }

    const start = performance.now();
    logger.info(`Reading ${config.filePath}`);

    const builder = new TaxonTreeBuilder();
    const built = await builder.build(readTaxonRows(config.filePath));
    logger.info(`Built tree with ${built.nodes} of ${built.rows} taxa`, {
      retried: built.retried,
      failed: built.failed,
    });

    await catalog.ensureDatabase(config.databaseName);

    const importer = new TaxonImporter(
      catalog.database(config.databaseName),
      env.IMPORT_BATCH_SIZE
    );
    const summary = await importer.run(config.tableName, builder);

    const seconds = ((performance.now() - start) / 1000).toFixed(2);
    logger.success(
      `Imported ${summary.inserted} taxa into ${config.databaseName}.${config.tableName} in ${seconds}s`
    );

    return summary;
  },
} satisfies CommandConfig<ImportSummary>;
