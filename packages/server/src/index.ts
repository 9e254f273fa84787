// טעינת .env לפני כל דבר אחר
import './envLoader';

import type { Server } from 'http';
import { AuthError, createModuleLogger, FetchError, setLogLevel, TuyaCloudClient } from 'tuya-telemetry-core';
import { ConfigError, loadConfig } from './config';
import type { ExporterConfig } from './config';
import { closeServer, createApp, startServer } from './app';
import { exitAfterLogging } from './processExit';
import { resolveDevices } from './deviceSetup';
import { createPollingService } from './pollingService';
import type { PollingService } from './pollingService';

const logger = createModuleLogger('MainIndex');

// תקלה שמונעת עלייה; ההודעה כבר מנוסחת לרשומת הלוג
class StartupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StartupError';
  }
}

let exiting = false;

function terminate(code: number): void {
  if (exiting) {
    return;
  }
  exiting = true;
  process.exitCode = code;
  exitAfterLogging(logger, code);
}

function fail(message: string, error: unknown): void {
  if (exiting) {
    // הלוגר כבר נסגר
    console.error(message, error);
    process.exitCode = 1;
    return;
  }
  logger.error(message, error);
  terminate(1);
}

function readConfig(): ExporterConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      throw new StartupError(`Invalid configuration: ${error.message}`, { cause: error });
    }
    throw error;
  }
}

async function main(): Promise<void> {
  const config = readConfig();
  setLogLevel(config.logLevel);
  logger.info(`Starting Tuya Exporter on port ${config.server.port}, refreshing every ${config.polling.pollIntervalMs / 1000} seconds.`);

  const client = new TuyaCloudClient({
    region: config.tuya.region,
    apiKey: config.tuya.apiKey,
    apiSecret: config.tuya.apiSecret,
    timeoutMs: config.polling.requestTimeoutMs,
  });

  try {
    await client.authenticate();
  } catch (error) {
    if (error instanceof AuthError) {
      throw new StartupError('Tuya cloud rejected the API credentials', { cause: error });
    }
    // תקלת רשת בעלייה חולפת; המתזמן ינסה שוב במחזור הבא
    const kind = error instanceof FetchError ? error.kind : 'unknown';
    logger.warn(`Could not authenticate at startup (${kind}), continuing`, { error });
  }

  const devices = await resolveDevices(config.devices, client);
  const service: PollingService = createPollingService(devices, client, config.polling);

  let server: Server;
  try {
    server = await startServer(createApp({ exporter: service.exporter, metricsPath: config.server.metricsPath }), config.server.port);
  } catch (error) {
    throw new StartupError(`Could not listen on port ${config.server.port}`, { cause: error });
  }
  logger.info(`Metrics available at http://localhost:${config.server.port}${config.server.metricsPath}`);

  service.scheduler.start();

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(`${signal} received. Attempting graceful shutdown...`);
    try {
      await service.scheduler.stop();
      await closeServer(server);
      logger.info('Exiting process.');
      terminate(0);
    } catch (error) {
      fail('Error during shutdown', error);
    }
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => fail('Error during shutdown', error));
    });
  }
}

process.on('uncaughtException', (error) => {
  fail('CRITICAL: Uncaught Exception:', error);
});

process.on('unhandledRejection', (reason) => {
  fail('CRITICAL: Unhandled Rejection:', reason);
});

main().catch((error: unknown) => {
  if (error instanceof StartupError) {
    fail(error.message, error.cause);
    return;
  }
  fail('Error during application startup:', error);
});
