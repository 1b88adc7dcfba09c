import * as fs from 'fs';
import * as path from 'path';
import express, { Express } from 'express';
import cors from 'cors';
import { Core } from './core';
import { createButtonsRouter } from './routes/buttons';
import { createDeviceRouter } from './routes/device';
import { createEventsRouter } from './routes/events';
import { createPagesRouter } from './routes/pages';
import { createPluginsRouter } from './routes/plugins';
import { VirtualDeviceDriver } from './services/deviceService';

export interface AppOptions {
  virtualPanel?: VirtualDeviceDriver;
  publicDir?: string;  // Editor assets; served when the directory exists
}

export function createApp(core: Core, options: AppOptions = {}): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  // API Routes
  app.use('/api/pages/:pageId/buttons', createButtonsRouter(core));
  app.use('/api/pages', createPagesRouter(core));
  app.use('/api/plugins', createPluginsRouter(core));
  app.use('/api/device', createDeviceRouter(core, options.virtualPanel));
  app.use('/api/events', createEventsRouter(core));

  // Simple ping endpoint
  app.get('/api/ping', (req, res) => {
    res.json({ pong: true, timestamp: Date.now() });
  });

  const publicDir = options.publicDir;
  if (publicDir && fs.existsSync(publicDir)) {
    app.use(express.static(publicDir));
    // Serve the editor for all other routes
    app.get('*', (req, res) => {
      res.sendFile(path.join(publicDir, 'index.html'));
    });
  }

  return app;
}
