import { AbciClient } from './client/AbciClient';
import { CometTransport } from './client/CometTransport';
import { ConfigError, loadConfig, WatchConfig } from './config';
import { LoggingNotifier } from './monitor/Notifier';
import { PollingOrchestrator } from './monitor/PollingOrchestrator';
import { ProposalTracker } from './monitor/ProposalTracker';
import { InMemorySubscriptionStore } from './store/SubscriptionStore';
import { maybeCoerceError } from './utils/helpers';
import { getLogger, setLogLevel } from './utils/logger';

function readConfig(): WatchConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      getLogger().error(error.message);
      process.exit(1);
    }
    throw error;
  }
}

async function main(): Promise<void> {
  const config = readConfig();
  setLogLevel(config.logLevel);
  const logger = getLogger('main');

  const transport = CometTransport.forEndpoint(config.rpcUrl, {
    timeoutMs: config.queryTimeoutMs,
    retries: config.queryRetries,
    backoffMs: config.retryBackoffMs,
  });
  const client = new AbciClient(transport);
  const notifier = new LoggingNotifier();
  const proposals = config.trackProposals
    ? new ProposalTracker(client, notifier, { startId: config.proposalStartId })
    : undefined;

  const orchestrator = new PollingOrchestrator(
    client,
    new InMemorySubscriptionStore(config.subscriptions),
    notifier,
    {
      concurrency: config.concurrency,
      changePolicy: { trackVotingPower: config.trackVotingPower },
      unableToQueryThreshold: config.unableToQueryThreshold,
      proposals,
    }
  );

  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`${signal} received, stopping`);
    await orchestrator.stop();
    await transport.close();
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error(`shutdown failed: ${maybeCoerceError(error).message}`);
        process.exitCode = 1;
      });
    });
  }

  try {
    const height = await transport.latestHeight();
    const active = await transport.consensusValidators(height);
    logger.info(`node at height ${height} with ${active.length} consensus validator(s)`);
  } catch (error) {
    logger.warn(`could not read the active set: ${maybeCoerceError(error).message}`);
  }

  logger.info(
    `watching ${config.subscriptions.length} subscription(s) on ${config.rpcUrl} every ${config.pollIntervalMs}ms`
  );
  orchestrator.start(config.pollIntervalMs);
}

main().catch((error: unknown) => {
  getLogger('main').error(maybeCoerceError(error).stack ?? String(error));
  process.exit(1);
});
