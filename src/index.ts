import { loadConfig, loadDotenv } from './config/load.js';
import { ConfigError, errorMessage } from './core/errors.js';
import { JsonLogger } from './core/logger.js';
import { Pipeline } from './jobs/pipeline.js';

const main = async (): Promise<void> => {
  loadDotenv();
  const config = loadConfig();
  const logger = new JsonLogger(config.logLevel, { service: 'boxwatch' });
  const pipeline = new Pipeline(config, logger);

  const onSignal = (name: string) => (): void => {
    logger.info('shutdown signal received', { signal: name });
    pipeline.stop(name).catch((err: unknown) => {
      logger.error('shutdown failed', { err: errorMessage(err) });
      process.exitCode = 1;
    });
  };
  process.once('SIGINT', onSignal('SIGINT'));
  process.once('SIGTERM', onSignal('SIGTERM'));

  await pipeline.start();
  await pipeline.wait();
  await pipeline.stop('all loops ended');
};

main().catch((err: unknown) => {
  const logger = new JsonLogger('error');
  if (err instanceof ConfigError) {
    logger.error('invalid configuration', { issues: err.details?.issues ?? [] });
  } else {
    logger.error('fatal startup error', { err: errorMessage(err), stack: err instanceof Error ? err.stack : undefined });
  }
  process.exit(1);
});
