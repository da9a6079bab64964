import { loadConfig, validateConfig } from './infrastructure/config/Config.js';
import { PinoLogger } from './infrastructure/logging/PinoLogger.js';
import { DashboardClient } from './infrastructure/tcp/DashboardClient.js';
import { ScriptClient } from './infrastructure/tcp/ScriptClient.js';
import { DashboardCommands } from './application/DashboardCommands.js';
import { HttpServer } from './presentation/HttpServer.js';

const CLIENT_VERSION = '1.0.0';

/**
 * Main entry point: connect to the dashboard server and serve the HTTP API
 */
async function main(): Promise<void> {
  const config = loadConfig();
  validateConfig(config);

  const logger = new PinoLogger({
    name: config.name,
    level: config.logging.level,
    pretty: config.logging.pretty,
  });

  logger.info('Robot dashboard client starting', {
    host: config.dashboard.host,
    port: config.dashboard.port,
    version: CLIENT_VERSION,
  });

  const client = new DashboardClient(
    {
      host: config.dashboard.host,
      port: config.dashboard.port,
      reconnectTimeout: config.timeouts.reconnect,
      ioTimeout: config.timeouts.io,
      replyTimeout: config.timeouts.reply,
      settleDelay: config.timeouts.settle,
      retryDelay: config.timeouts.retry,
    },
    logger.child({ component: 'DashboardClient' })
  );

  const commands = new DashboardCommands(client, logger.child({ component: 'DashboardCommands' }));

  const scriptClient = config.script.enabled
    ? new ScriptClient(
        {
          host: config.dashboard.host,
          port: config.script.port,
          reconnectTimeout: config.script.reconnect,
          ioTimeout: config.timeouts.io,
          settleDelay: config.timeouts.settle,
          retryDelay: config.timeouts.retry,
        },
        logger.child({ component: 'ScriptClient' })
      )
    : null;

  const httpServer = config.http.enabled
    ? new HttpServer(
        client,
        commands,
        logger.child({ component: 'HttpServer' }),
        { port: config.http.port, version: CLIENT_VERSION },
        scriptClient
      )
    : null;

  client.onConnectionStateChange((state) => {
    logger.info('Dashboard connection state', { state });
  });

  let shuttingDown = false;
  const shutdown = async (): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down...');
    await httpServer?.stop();
    await scriptClient?.close();
    await client.close();
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((error) => {
      logger.fatal('Shutdown failed', error);
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  client.start();
  await httpServer?.start();

  if (httpServer) {
    logger.info(`HTTP API available at http://localhost:${config.http.port}`);
  }
  logger.info('Press Ctrl+C to stop.');
}

main().catch((error) => {
  console.error('Unhandled error:', error);
  process.exit(1);
});
