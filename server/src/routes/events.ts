import { Router, Request, Response } from 'express';
import { Core } from '../core';
import { CoreEventName } from '../events';

// Events forwarded to the browser; key-pressed stays internal
export const STREAMED_EVENTS: CoreEventName[] = [
  'page-switched',
  'button-updated',
  'pages-changed',
  'connectivity-changed',
  'action-dispatched'
];

const KEEPALIVE_MS = 25000;

export function createEventsRouter(core: Core): Router {
  const router = Router();

  // GET /api/events - Server-Sent Events stream of state changes
  router.get('/', (req: Request, res: Response) => {
    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive'
    });
    res.write(`event: connectivity-changed\ndata: ${JSON.stringify({ state: core.synchronizer.getDeviceState().state })}\n\n`);

    const unsubscribers = STREAMED_EVENTS.map(event =>
      core.bus.on(event, payload => {
        res.write(`event: ${event}\ndata: ${JSON.stringify(payload)}\n\n`);
      })
    );
    const keepalive = setInterval(() => {
      res.write(': keepalive\n\n');
    }, KEEPALIVE_MS);

    req.on('close', () => {
      clearInterval(keepalive);
      for (const unsubscribe of unsubscribers) unsubscribe();
    });
  });

  return router;
}
