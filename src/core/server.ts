#!/usr/bin/env node
/**
 * core/server.ts
 *
 * The single entry point. Orchestrates startup in order:
 *   1. Load environment variables from .env
 *   2. Build the service config (defaults → config/service.json → env → CLI)
 *   3. Initialise the logger
 *   4. Import the rest of the service (module loggers pick up the level)
 *   5. Wire store → reader → broker (→ consent gate) → loop
 *   6. First enumeration pass, then the refresh timer
 *   7. Start the HTTP transport
 */

import * as path from 'path';
import * as fs from 'fs';
import * as http from 'http';
import * as dotenv from 'dotenv';

// Project root relative to dist/core/, then CWD
const possibleEnvPaths = [
  path.resolve(__dirname, '..', '..', '.env'),
  path.resolve(process.cwd(), '.env')
];

const envPath = possibleEnvPaths.find(p => fs.existsSync(p));
dotenv.config(envPath ? { path: envPath } : {});

import { initLogger, scopedLogger } from './logger';
import { loadConfig } from './config';
import { errorMessage } from './errors';
import { ServiceConfig } from './types';

const SHUTDOWN_TIMEOUT_MS = 5000;

interface Running {
  server: http.Server;
  stopLoop: () => void;
  idle: () => Promise<void>;
}

async function boot(config: ServiceConfig): Promise<Running> {
  const log = scopedLogger('core/server');

  // Imported only now so every module logger is a child of the configured root
  const { PowerShellRegistryStore } = await import('../store/powershell_store');
  const { DeviceRegistryReader } = await import('../devices/device_reader');
  const { NetSessionProbe } = await import('../elevation/privilege');
  const { PowerShellRunAsLauncher } = await import('../elevation/launcher');
  const { FileElevationChannel } = await import('../elevation/channel');
  const { PrivilegeBroker } = await import('../elevation/privilege_broker');
  const { ConsentGate } = await import('../elevation/consent');
  const { ReconcileLoop } = await import('../reconcile/reconcile_loop');
  const { createHttpTransport } = await import('../transports/http');

  const store = new PowerShellRegistryStore(config.powershellTimeoutMs);
  const reader = new DeviceRegistryReader(store, config.enumerationRoot);
  const channel = new FileElevationChannel(new PowerShellRunAsLauncher({ executorScript: config.executorScript }));
  const consent = config.confirmElevation ? new ConsentGate(config.elevationTimeoutMs) : undefined;
  const broker = new PrivilegeBroker(
    new NetSessionProbe(),
    { store, channel, elevationTimeoutMs: config.elevationTimeoutMs, confirmElevation: consent?.confirm },
    { tryDirectFirst: config.tryDirectFirst }
  );
  const loop = new ReconcileLoop(reader, broker, store, { refreshIntervalMs: config.refreshIntervalMs });

  await loop.start();
  log.info({ devices: loop.snapshot().length }, 'Device set loaded');

  const app = createHttpTransport(loop, config, consent);
  const server = await new Promise<http.Server>((resolve, reject) => {
    const s = app.listen(config.port, config.host, () => resolve(s));
    s.once('error', reject);
  });
  log.info({ host: config.host, port: config.port }, 'HTTP server listening');

  return {
    server,
    stopLoop: () => {
      loop.stop();
      consent?.close();
    },
    idle: () => loop.idle()
  };
}

async function gracefulShutdown(running: Running, signal: string): Promise<void> {
  const log = scopedLogger('core/server');
  log.info({ signal }, 'Received shutdown signal, starting graceful shutdown');

  running.stopLoop();
  running.server.close(() => {
    log.info('Server stopped accepting new connections');
  });

  // Writes already handed to the broker are allowed to settle
  let timer: NodeJS.Timeout | undefined;
  const timedOut = await Promise.race([
    running.idle().then(() => false),
    new Promise<boolean>(resolve => {
      timer = setTimeout(() => resolve(true), SHUTDOWN_TIMEOUT_MS);
    })
  ]);
  if (timer) clearTimeout(timer);

  if (timedOut) log.warn('Shutdown timeout reached, forcing exit');
  else log.info('All pending writes settled');

  log.info('Graceful shutdown complete');
  process.exit(0);
}

async function main(): Promise<void> {
  const config = loadConfig();

  initLogger(config);
  const log = scopedLogger('core/server');
  log.info(
    { port: config.port, refreshIntervalMs: config.refreshIntervalMs, tryDirectFirst: config.tryDirectFirst },
    'USB sleep control starting'
  );

  const running = await boot(config);

  const onSignal = (signal: string): void => {
    gracefulShutdown(running, signal).catch((e: unknown) => {
      log.fatal({ error: errorMessage(e) }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.once('SIGTERM', () => onSignal('SIGTERM'));
  process.once('SIGINT', () => onSignal('SIGINT'));
}

// ---------------------------------------------------------------------------
// Run
// ---------------------------------------------------------------------------

main().catch((e: unknown) => {
  console.error('Fatal error during startup:', errorMessage(e));
  if (e instanceof Error && e.stack) console.error(e.stack);
  process.exit(1);
});
