import * as dotenv from 'dotenv';
import { ConfigError, loadNodeConfig, NodeConfig } from './config/node-config';
import { IssuanceNode } from './issuance-node';
import { describeError, logger } from './observability/structured-logger';

dotenv.config();

function loadConfigOrExit(): NodeConfig {
  try {
    return loadNodeConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      console.error('\nPlease configure these in your .env file.');
      process.exit(1);
    }
    throw error;
  }
}

async function main() {
  const config = loadConfigOrExit();

  logger.info('Main', 'Configuration', {
    network: config.network,
    port: config.port,
    dataDir: config.dataDir,
    blockTimeMs: config.blockTimeMs,
    maxIssuers: config.issuance.maxIssuers,
    issuerTermLength: config.issuance.issuerTermLength,
    baseMintFactor: config.issuance.baseMintFactor,
    supplyFloor: config.issuance.supplyFloor,
  });

  const node = new IssuanceNode(config);

  // Graceful shutdown
  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info('Main', `Received ${signal}, shutting down gracefully...`);
    node
      .stop()
      .then(() => process.exit(0))
      .catch((error) => {
        logger.error('Main', 'Shutdown failed', { error: describeError(error) });
        process.exit(1);
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await node.start();
}

main().catch((error) => {
  logger.error('Main', 'Fatal error', { error: describeError(error) });
  process.exit(1);
});
