import { Server } from 'http';
import { config } from './config';
import { logger, COMBINED_LOG_FILE } from './utils/logger';
import { createApp } from './app';
import DeviceRegistry from './services/deviceRegistry';
import ProbeOrchestrator from './services/probeOrchestrator';
import WakeOnLanSender from './services/wakeOnLan';

interface Services {
  registry: DeviceRegistry;
  orchestrator: ProbeOrchestrator;
  wakeSender: WakeOnLanSender;
}

function createServices(): Services {
  const registry = new DeviceRegistry(config.storage.devicesFile);
  const orchestrator = new ProbeOrchestrator(registry, {
    port: config.probe.port,
    timeoutMs: config.probe.timeoutMs,
    concurrency: config.probe.concurrency,
  });
  return { registry, orchestrator, wakeSender: new WakeOnLanSender() };
}

function logStartupDiagnostics(): void {
  logger.info('wakebox startup diagnostics', {
    version: config.version,
    environment: config.server.env,
    devicesFile: config.storage.devicesFile,
    wol: config.wol,
    probe: config.probe,
    wakeVerification: config.wakeVerification,
    nodeRuntime: process.version,
    platform: process.platform,
  });
}

function registerShutdown(server: Server, orchestrator: ProbeOrchestrator): void {
  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down gracefully...`);
    orchestrator.stopPeriodicRefresh();
    server.close((error) => {
      if (error) {
        logger.error('Error during shutdown:', { error: error.message });
        process.exit(1);
      }
      logger.info('HTTP server closed');
      process.exit(0);
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

/**
 * Build the services, load the device store and start listening.
 * Rejects when configuration or the device store is unusable.
 */
export async function startServer(): Promise<Server> {
  logStartupDiagnostics();
  const { registry, orchestrator, wakeSender } = createServices();

  // Create the device store if needed and load it
  await registry.initialize();

  const app = createApp({
    registry,
    orchestrator,
    wakeSender,
    wakeSettings: {
      defaultPort: config.wol.port,
      broadcastAddress: config.wol.broadcastAddress,
      probePort: config.probe.port,
      probeTimeoutMs: config.probe.timeoutMs,
      verification: config.wakeVerification,
    },
    probeDefaults: {
      port: config.probe.port,
      timeoutMs: config.probe.timeoutMs,
    },
    logFile: COMBINED_LOG_FILE,
  });

  orchestrator.startPeriodicRefresh(config.probe.refreshInterval);

  const server = app.listen(config.server.port, config.server.host, () => {
    const address = server.address();
    if (typeof address === 'string') {
      logger.info(`wakebox listening at ${address}`);
    } else if (address) {
      logger.info(`wakebox listening at http://${address.address}:${address.port}`);
      logger.info(`Environment: ${config.server.env}`);
      logger.info(`CORS origins: ${config.cors.origins.join(', ')}`);
    }
  });

  registerShutdown(server, orchestrator);
  return server;
}

if (require.main === module) {
  startServer().catch((error: unknown) => {
    logger.error('Failed to start server:', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  });
}
