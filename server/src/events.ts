import { EventEmitter } from 'events';

export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'reconnecting';

export type DispatchOutcome = 'succeeded' | 'failed' | 'skipped';

// State-change notifications the web layer may subscribe to
export interface CoreEvents {
  'page-switched': { pageId: string };
  'button-updated': { pageId: string; slot: number };
  'pages-changed': { reason: 'created' | 'deleted' | 'updated' | 'reordered'; pageId: string };
  'connectivity-changed': { state: ConnectionState; error?: string };
  'key-pressed': { pageId: string; slot: number };
  'action-dispatched': {
    pageId: string;
    slot: number;
    pluginId?: string;
    outcome: DispatchOutcome;
    message?: string;
  };
}

export type CoreEventName = keyof CoreEvents;
export type CoreEventListener<K extends CoreEventName> = (payload: CoreEvents[K]) => void;

/**
 * Typed wrapper around EventEmitter. A listener that throws is logged and
 * skipped so the emitting component never sees the failure.
 */
export class NotificationBus {
  private emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(50);
  }

  // Subscribe; the returned function unsubscribes
  on<K extends CoreEventName>(event: K, listener: CoreEventListener<K>): () => void {
    const safe: CoreEventListener<K> = payload => {
      try {
        listener(payload);
      } catch (error) {
        console.error(`[Events] Listener for ${event} failed:`, error);
      }
    };
    this.emitter.on(event, safe);
    return () => {
      this.emitter.off(event, safe);
    };
  }

  emit<K extends CoreEventName>(event: K, payload: CoreEvents[K]): void {
    this.emitter.emit(event, payload);
  }

  listenerCount(event: CoreEventName): number {
    return this.emitter.listenerCount(event);
  }
}
