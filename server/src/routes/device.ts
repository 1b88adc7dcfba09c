import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { Core } from '../core';
import { ValidationError } from '../errors';
import { ImageFormat, VirtualDeviceDriver } from '../services/deviceService';
import { intParam, parseBody, sendError } from './errors';

const CONTENT_TYPES: Record<ImageFormat, string> = {
  jpeg: 'image/jpeg',
  bmp: 'image/bmp',
  rgb: 'application/octet-stream'
};

const brightnessBody = z.object({
  brightness: z.unknown()
});

// `virtualPanel` enables the simulated-panel endpoints
export function createDeviceRouter(core: Core, virtualPanel?: VirtualDeviceDriver): Router {
  const router = Router();
  const { synchronizer, renderCache } = core;

  // GET /api/device - Model, layout, connectivity and brightness
  router.get('/', (req: Request, res: Response) => {
    try {
      res.json({
        ...synchronizer.getDeviceState(),
        virtual: virtualPanel !== undefined,
        renderCache: renderCache.stats()
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  // PUT /api/device/brightness - Set brightness (0-100)
  router.put('/brightness', async (req: Request, res: Response) => {
    try {
      const { brightness } = parseBody(brightnessBody, req.body);
      await synchronizer.setBrightness(brightness);
      res.json({ brightness: synchronizer.getDeviceState().brightness });
    } catch (error) {
      sendError(res, error);
    }
  });

  // POST /api/device/reconnect - Reopen the device now
  router.post('/reconnect', async (req: Request, res: Response) => {
    try {
      const connected = await synchronizer.reconnect();
      res.json({ connected, ...synchronizer.getDeviceState() });
    } catch (error) {
      sendError(res, error);
    }
  });

  // POST /api/device/clear - Blank every key until the next sync
  router.post('/clear', async (req: Request, res: Response) => {
    try {
      await synchronizer.clearPanel();
      res.json({ success: true });
    } catch (error) {
      sendError(res, error);
    }
  });

  // GET /api/device/keys/:slot/image - Last image written to a key of the virtual panel
  router.get('/keys/:slot/image', (req: Request, res: Response) => {
    if (!virtualPanel) {
      return res.status(404).json({ error: 'No virtual panel attached' });
    }
    const image = virtualPanel.getKeyImage(intParam(req.params.slot));
    if (!image) {
      return res.status(404).json({ error: `Nothing written to key ${req.params.slot}` });
    }
    res.type(CONTENT_TYPES[virtualPanel.info.imageFormat]).send(image);
  });

  // POST /api/device/keys/:slot/press - Simulate a press and release on the virtual panel
  router.post('/keys/:slot/press', (req: Request, res: Response) => {
    try {
      if (!virtualPanel) {
        return res.status(404).json({ error: 'No virtual panel attached' });
      }
      try {
        virtualPanel.tap(intParam(req.params.slot));
      } catch (error) {
        if (error instanceof RangeError) {
          throw new ValidationError(error.message, [{ path: 'slot', message: error.message }]);
        }
        throw error;
      }
      res.json({ success: true });
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
