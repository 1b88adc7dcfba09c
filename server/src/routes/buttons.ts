import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { Core } from '../core';
import { intParam, parseBody, sendError } from './errors';

const swapBody = z.object({
  slotA: z.number().int(),
  slotB: z.number().int()
});

const moveBody = z.object({
  targetPageId: z.string().min(1)
});

// Mounted at /api/pages/:pageId/buttons
export function createButtonsRouter(core: Core): Router {
  const router = Router({ mergeParams: true });
  const { store, dispatcher } = core;

  // GET /api/pages/:pageId/buttons - Buttons of a page, by slot
  router.get('/', (req: Request, res: Response) => {
    try {
      res.json(store.getPage(req.params.pageId).buttons);
    } catch (error) {
      sendError(res, error);
    }
  });

  // POST /api/pages/:pageId/buttons/swap - Exchange two slots
  router.post('/swap', (req: Request, res: Response) => {
    try {
      const { slotA, slotB } = parseBody(swapBody, req.body);
      store.swapButtons(req.params.pageId, slotA, slotB);
      res.json(store.getPage(req.params.pageId).buttons);
    } catch (error) {
      sendError(res, error);
    }
  });

  // GET /api/pages/:pageId/buttons/:slot - One button
  router.get('/:slot', (req: Request, res: Response) => {
    try {
      const button = store.getButton(req.params.pageId, intParam(req.params.slot));
      if (!button) {
        return res.status(404).json({ error: `Slot ${req.params.slot} is empty` });
      }
      res.json(button);
    } catch (error) {
      sendError(res, error);
    }
  });

  // PUT /api/pages/:pageId/buttons/:slot - Configure a button
  router.put('/:slot', (req: Request, res: Response) => {
    try {
      res.json(store.setButton(req.params.pageId, intParam(req.params.slot), req.body));
    } catch (error) {
      sendError(res, error);
    }
  });

  // DELETE /api/pages/:pageId/buttons/:slot - Empty a slot
  router.delete('/:slot', (req: Request, res: Response) => {
    try {
      const cleared = store.clearButton(req.params.pageId, intParam(req.params.slot));
      res.json({ success: true, cleared });
    } catch (error) {
      sendError(res, error);
    }
  });

  // POST /api/pages/:pageId/buttons/:slot/move - Move to the first free slot of another page
  router.post('/:slot/move', (req: Request, res: Response) => {
    try {
      const { targetPageId } = parseBody(moveBody, req.body);
      const slot = store.moveButton(req.params.pageId, intParam(req.params.slot), targetPageId);
      res.json({ pageId: targetPageId, slot });
    } catch (error) {
      sendError(res, error);
    }
  });

  // POST /api/pages/:pageId/buttons/:slot/press - Run the button's action from the editor
  router.post('/:slot/press', async (req: Request, res: Response) => {
    try {
      res.json(await dispatcher.onKeyPress(req.params.pageId, intParam(req.params.slot)));
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
