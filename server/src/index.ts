import * as path from 'path';
import { createApp } from './app';
import { loadConfig } from './config';
import { createCore } from './core';
import { JsonFilePersistence } from './db';
import { VirtualDeviceDriver } from './services/deviceService';
import { startAdvertising, stopAdvertising } from './services/discoveryService';

async function start() {
  const config = loadConfig();
  const driver = new VirtualDeviceDriver(config.deviceModel);
  const core = createCore({
    config,
    persistence: new JsonFilePersistence(config.dataDir),
    driver
  });

  const app = createApp(core, {
    virtualPanel: driver,
    publicDir: path.join(__dirname, '../public')
  });

  const server = app.listen(config.port, () => {
    console.log(`\n========================================`);
    console.log(`keypanel server running on port ${config.port}`);
    console.log(`========================================`);
    console.log(`Editor:       http://localhost:${config.port}`);
    console.log(`API Base URL: http://localhost:${config.port}/api`);
    console.log(`Data dir:     ${config.dataDir}`);
    console.log(`========================================\n`);

    if (config.mdnsEnabled) {
      startAdvertising(config.port);
    }
  });

  await core.start();

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log('\nShutting down...');
    server.close();
    await stopAdvertising();
    await core.shutdown();
    process.exit(0);
  };

  // Handle graceful shutdown
  process.on('SIGINT', () => {
    shutdown().catch(error => {
      console.error('Shutdown failed:', error);
      process.exit(1);
    });
  });
  process.on('SIGTERM', () => {
    shutdown().catch(error => {
      console.error('Shutdown failed:', error);
      process.exit(1);
    });
  });
}

start().catch(error => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
