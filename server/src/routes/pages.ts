import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { Core } from '../core';
import { colorSchema } from '../db/schema';
import { parseBody, sendError } from './errors';

const createPageBody = z.object({
  title: z.string(),
  backgroundColor: colorSchema.optional(),
  textColor: colorSchema.optional()
});

const reorderBody = z.object({
  index: z.number().int()
});

export function createPagesRouter(core: Core): Router {
  const router = Router();
  const { store, pages } = core;

  // GET /api/pages - All pages in display order
  router.get('/', (req: Request, res: Response) => {
    try {
      res.json({ activePageId: pages.currentPageId(), pages: store.listPages() });
    } catch (error) {
      sendError(res, error);
    }
  });

  // POST /api/pages - Create a page
  router.post('/', (req: Request, res: Response) => {
    try {
      const { title, ...colors } = parseBody(createPageBody, req.body);
      res.status(201).json(store.createPage(title, colors));
    } catch (error) {
      sendError(res, error);
    }
  });

  // GET /api/pages/active - Page currently shown on the panel
  router.get('/active', (req: Request, res: Response) => {
    try {
      res.json(pages.currentPage());
    } catch (error) {
      sendError(res, error);
    }
  });

  // POST /api/pages/next - Show the next page (wraps around)
  router.post('/next', (req: Request, res: Response) => {
    try {
      res.json(pages.nextPage());
    } catch (error) {
      sendError(res, error);
    }
  });

  // POST /api/pages/previous - Show the previous page (wraps around)
  router.post('/previous', (req: Request, res: Response) => {
    try {
      res.json(pages.previousPage());
    } catch (error) {
      sendError(res, error);
    }
  });

  // GET /api/pages/:id - One page with its buttons
  router.get('/:id', (req: Request, res: Response) => {
    try {
      res.json(store.getPage(req.params.id));
    } catch (error) {
      sendError(res, error);
    }
  });

  // PATCH /api/pages/:id - Change title or default colors
  router.patch('/:id', (req: Request, res: Response) => {
    try {
      res.json(store.updatePage(req.params.id, req.body));
    } catch (error) {
      sendError(res, error);
    }
  });

  // DELETE /api/pages/:id - Delete a page (never the last one)
  router.delete('/:id', (req: Request, res: Response) => {
    try {
      store.deletePage(req.params.id);
      res.json({ success: true });
    } catch (error) {
      sendError(res, error);
    }
  });

  // POST /api/pages/:id/activate - Show a page on the panel
  router.post('/:id/activate', (req: Request, res: Response) => {
    try {
      res.json(pages.activate(req.params.id));
    } catch (error) {
      sendError(res, error);
    }
  });

  // POST /api/pages/:id/reorder - Move a page to a position in display order
  router.post('/:id/reorder', (req: Request, res: Response) => {
    try {
      const { index } = parseBody(reorderBody, req.body);
      res.json(store.reorderPage(req.params.id, index));
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
