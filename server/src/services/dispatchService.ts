import { Button } from '../db';
import { ConfigStore } from '../db/configStore';
import { PluginTimeoutError, errorMessage } from '../errors';
import { DispatchOutcome, NotificationBus } from '../events';
import { PluginRegistry } from '../plugins/pluginManager';
import { ActionResult } from '../plugins/types';

// How long a plugin's display text stays on the pressed key
export const OVERLAY_TTL_MS = 5000;

export type DispatchStatus =
  | { status: 'skipped'; reason: string }
  | { status: 'succeeded'; message?: string; display?: string }
  | { status: 'failed'; message: string; display?: string };

// Where display text from a plugin is shown
export interface OverlaySink {
  showOverlay(pageId: string, slot: number, text: string, ttlMs: number): void;
}

export interface DispatcherOptions {
  store: ConfigStore;
  registry: PluginRegistry;
  bus: NotificationBus;
  overlays?: OverlaySink;
  timeoutMs?: number;
  queueSize?: number;
  concurrency?: number;
}

interface QueuedPress {
  pageId: string;
  slot: number;
}

/**
 * Turns key presses into plugin calls. Every call runs under a timeout and
 * every failure ends up in the returned status, never in the caller.
 */
export class ActionDispatcher {
  private store: ConfigStore;
  private registry: PluginRegistry;
  private bus: NotificationBus;
  private overlays: OverlaySink | null;
  private timeoutMs: number;
  private queueSize: number;
  private concurrency: number;

  private queue: QueuedPress[] = [];
  private active = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(options: DispatcherOptions) {
    this.store = options.store;
    this.registry = options.registry;
    this.bus = options.bus;
    this.overlays = options.overlays ?? null;
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.queueSize = options.queueSize ?? 32;
    this.concurrency = options.concurrency ?? 2;
  }

  async onKeyPress(pageId: string, slot: number): Promise<DispatchStatus> {
    let button: Button | null;
    try {
      button = this.store.getButton(pageId, slot);
    } catch (error) {
      return this.finish(pageId, slot, undefined, { status: 'failed', message: errorMessage(error) });
    }

    if (!button) {
      return this.finish(pageId, slot, undefined, { status: 'skipped', reason: 'Slot is empty' });
    }
    if (!button.enabled) {
      return this.finish(pageId, slot, undefined, { status: 'skipped', reason: 'Button is disabled' });
    }
    if (button.action.type === 'none') {
      return this.finish(pageId, slot, undefined, { status: 'skipped', reason: 'Button has no action' });
    }

    const { pluginId, config } = button.action;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new PluginTimeoutError(pluginId, this.timeoutMs));
      }, this.timeoutMs);
    });

    console.log(`[Dispatch] Running ${pluginId} for key ${slot} on page ${pageId}`);
    let result: ActionResult;
    try {
      const context = {
        pageId,
        slot,
        label: button.label,
        timestamp: Date.now(),
        signal: controller.signal
      };
      result = await Promise.race([this.registry.dispatch(pluginId, context, config), timeout]);
    } catch (error) {
      console.error(`[Dispatch] ${pluginId} failed:`, error);
      return this.finish(pageId, slot, pluginId, { status: 'failed', message: errorMessage(error) });
    } finally {
      clearTimeout(timer);
    }

    if (result.display && this.overlays) {
      this.overlays.showOverlay(pageId, slot, result.display, OVERLAY_TTL_MS);
    }

    if (!result.success) {
      const message = result.message ?? 'Action failed';
      console.error(`[Dispatch] ${pluginId} reported failure: ${message}`);
      return this.finish(pageId, slot, pluginId, withDisplay({ status: 'failed', message }, result.display));
    }
    return this.finish(
      pageId,
      slot,
      pluginId,
      withDisplay({ status: 'succeeded', message: result.message }, result.display)
    );
  }

  // Queue a press for the worker pool; returns false when the queue is full and the press is dropped
  enqueue(pageId: string, slot: number): boolean {
    if (this.queue.length >= this.queueSize) {
      console.warn(`[Dispatch] Queue full (${this.queueSize}), dropping press on key ${slot}`);
      return false;
    }
    this.queue.push({ pageId, slot });
    this.pump();
    return true;
  }

  pending(): number {
    return this.queue.length + this.active;
  }

  // Resolves once the queue is empty and nothing is running
  drain(): Promise<void> {
    if (this.pending() === 0) return Promise.resolve();
    return new Promise(resolve => {
      this.idleWaiters.push(resolve);
    });
  }

  private pump(): void {
    while (this.active < this.concurrency && this.queue.length > 0) {
      const press = this.queue.shift();
      if (!press) break;
      this.active++;
      this.onKeyPress(press.pageId, press.slot)
        .catch(error => {
          console.error('[Dispatch] Unexpected error:', error);
        })
        .then(() => {
          this.active--;
          this.pump();
          if (this.pending() === 0) {
            const waiters = this.idleWaiters.splice(0);
            for (const resolve of waiters) resolve();
          }
        });
    }
  }

  private finish(pageId: string, slot: number, pluginId: string | undefined, status: DispatchStatus): DispatchStatus {
    const outcome: DispatchOutcome = status.status;
    const message = status.status === 'skipped' ? status.reason : status.message;
    this.bus.emit('action-dispatched', {
      pageId,
      slot,
      ...(pluginId ? { pluginId } : {}),
      outcome,
      ...(message ? { message } : {})
    });
    return status;
  }
}

function withDisplay<T extends DispatchStatus>(status: T, display: string | undefined): T {
  return display ? { ...status, display } : status;
}
