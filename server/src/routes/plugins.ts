import { Router, Request, Response } from 'express';
import { Core } from '../core';
import { UnknownPluginError } from '../errors';
import { sendError } from './errors';

export function createPluginsRouter(core: Core): Router {
  const router = Router();
  const { registry } = core;

  // GET /api/plugins - All registered plugins with their config schemas
  router.get('/', (req: Request, res: Response) => {
    try {
      res.json(registry.listDescriptors());
    } catch (error) {
      sendError(res, error);
    }
  });

  // GET /api/plugins/:id - One plugin
  router.get('/:id', (req: Request, res: Response) => {
    try {
      const plugin = registry.listDescriptors().find(p => p.id === req.params.id);
      if (!plugin) {
        throw new UnknownPluginError(req.params.id);
      }
      res.json(plugin);
    } catch (error) {
      sendError(res, error);
    }
  });

  // POST /api/plugins/:id/validate - Check a config before saving it to a button
  router.post('/:id/validate', (req: Request, res: Response) => {
    try {
      const config = registry.validate(req.params.id, req.body);
      res.json({ valid: true, config });
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
