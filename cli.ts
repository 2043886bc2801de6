import { run } from './src/cli/run';
import { logger } from './src/helpers/logger';

run(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error('CLI Error:', { error });
    process.exitCode = 1;
  });
