import { Button, Page } from '../db';
import { ConfigStore } from '../db/configStore';
import { IOError, InvalidBrightnessError, errorMessage } from '../errors';
import { ConnectionState, NotificationBus } from '../events';
import { DeviceDriver, DeviceHandle, DeviceInfo, KeyEvent } from './deviceService';
import { PageManager } from './pageService';
import { RenderCache, RenderedBitmap, blankButton } from './renderService';

const INITIAL_BACKOFF_MS = 500;
const MAX_BACKOFF_MS = 30000;
const CLEAR_COLORS = { backgroundColor: '#000000', textColor: '#000000' };

export interface SynchronizerOptions {
  driver: DeviceDriver;
  store: ConfigStore;
  pages: PageManager;
  renderCache: RenderCache;
  bus: NotificationBus;
  brightness?: number;
  heartbeatIntervalMs?: number;
  pollTimeoutMs?: number;
  debugDevice?: boolean;
}

export interface DeviceState {
  state: ConnectionState;
  brightness: number;
  device: DeviceInfo | null;
  lastError: string | null;
  reconnectAttempts: number;
}

interface Overlay {
  text: string;
  timer: NodeJS.Timeout;
}

function overlayKey(pageId: string, slot: number): string {
  return `${pageId}:${slot}`;
}

// Wait before reconnect attempt `attempt` (0-based): 500 ms doubling, capped at 30 s
export function reconnectDelay(attempt: number): number {
  return Math.min(INITIAL_BACKOFF_MS * 2 ** attempt, MAX_BACKOFF_MS);
}

export function validateBrightness(value: unknown): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || value > 100) {
    throw new InvalidBrightnessError(value);
  }
  return value;
}

/**
 * Owns the device handle and keeps the panel showing the active page.
 *
 * Connectivity is a small state machine:
 * disconnected → connecting → connected → (I/O failure) → disconnected →
 * reconnecting → connecting ... Only this class touches the handle.
 */
export class DeviceSynchronizer {
  private driver: DeviceDriver;
  private store: ConfigStore;
  private pages: PageManager;
  private renderCache: RenderCache;
  private bus: NotificationBus;
  private heartbeatIntervalMs: number;
  private pollTimeoutMs: number;
  private debugDevice: boolean;

  private state: ConnectionState = 'disconnected';
  private brightness: number;
  private handle: DeviceHandle | null = null;
  private connectionId = 0;
  private lastError: string | null = null;
  private running = false;
  private connecting: Promise<boolean> | null = null;
  private reconnectAttempts = 0;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private heartbeat: NodeJS.Timeout | null = null;
  private polling: Promise<void> | null = null;
  private currentTick: Promise<void> | null = null;
  private followUpTick: Promise<void> | null = null;
  private subscriptions: Array<() => void> = [];

  // Hash last written to each physical key
  private lastPushed: Map<number, string> = new Map();
  // Keys currently held down
  private held: Set<number> = new Set();
  private overlays: Map<string, Overlay> = new Map();

  constructor(options: SynchronizerOptions) {
    this.driver = options.driver;
    this.store = options.store;
    this.pages = options.pages;
    this.renderCache = options.renderCache;
    this.bus = options.bus;
    this.brightness = validateBrightness(options.brightness ?? 100);
    this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? 30000;
    this.pollTimeoutMs = options.pollTimeoutMs ?? 100;
    this.debugDevice = options.debugDevice ?? false;
  }

  // Connect, start polling and keep the panel in sync until stop()
  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    console.log('[Sync] Starting device synchronizer');

    this.subscriptions.push(
      this.bus.on('page-switched', () => {
        this.syncInBackground();
      }),
      this.bus.on('button-updated', event => {
        this.clearOverlay(event.pageId, event.slot);
        if (event.pageId === this.pages.currentPageId()) {
          this.syncInBackground();
        }
      }),
      this.bus.on('pages-changed', () => {
        this.syncInBackground();
      })
    );

    this.heartbeat = setInterval(() => {
      if (this.state === 'connected') {
        this.syncInBackground();
      }
    }, this.heartbeatIntervalMs);

    await this.connect();
  }

  // Stop polling and retries, drop overlays and close the device
  async stop(): Promise<void> {
    this.running = false;

    for (const unsubscribe of this.subscriptions) unsubscribe();
    this.subscriptions = [];
    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = null;
    }
    this.cancelReconnect();
    for (const overlay of this.overlays.values()) clearTimeout(overlay.timer);
    this.overlays.clear();

    await this.closeHandle();
    if (this.polling) await this.polling;
    if (this.currentTick) await this.currentTick;
    this.setState('disconnected');
    console.log('[Sync] Stopped device synchronizer');
  }

  /**
   * Open the device and paint the active page from scratch. Resolves false
   * when the device could not be opened; a retry is scheduled while running.
   */
  connect(): Promise<boolean> {
    if (!this.connecting) {
      this.connecting = this.openDevice().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  // Drop the current connection (if any) and connect again right away
  async reconnect(): Promise<boolean> {
    console.log('[Sync] Manual reconnect requested');
    this.cancelReconnect();
    this.reconnectAttempts = 0;
    await this.closeHandle();
    this.setState('disconnected');
    return this.connect();
  }

  private async openDevice(): Promise<boolean> {
    const wasRunning = this.running;
    this.setState('connecting');

    let handle: DeviceHandle;
    try {
      handle = await this.driver.open();
    } catch (error) {
      this.lastError = errorMessage(error);
      console.error(`[Sync] Failed to open device: ${this.lastError}`);
      this.setState('disconnected', this.lastError);
      this.scheduleReconnect();
      return false;
    }

    if (wasRunning && !this.running) {
      await handle.close();
      return false;
    }

    this.handle = handle;
    this.connectionId++;
    this.lastPushed.clear();
    this.held.clear();
    this.renderCache.configure(handle.info);

    try {
      await handle.setBrightness(this.brightness);
    } catch (error) {
      this.handleIoFailure(error);
      return false;
    }

    this.reconnectAttempts = 0;
    this.lastError = null;
    this.setState('connected');
    console.log(`[Sync] Connected to ${handle.info.model} panel ${handle.info.serial} (${handle.info.keyCount} keys)`);

    if (this.running) {
      this.startPolling();
    }
    await this.requestSync();
    return this.state === 'connected';
  }

  /**
   * Bring the panel in line with the active page. Ticks never overlap;
   * requests made while a tick runs share one follow-up tick.
   */
  requestSync(): Promise<void> {
    if (!this.currentTick) {
      this.currentTick = this.runTick().finally(() => {
        this.currentTick = null;
      });
      return this.currentTick;
    }
    if (!this.followUpTick) {
      this.followUpTick = this.currentTick.then(() => {
        this.followUpTick = null;
        return this.requestSync();
      });
    }
    return this.followUpTick;
  }

  private syncInBackground(): void {
    this.requestSync().catch(error => {
      console.error('[Sync] Sync tick error:', error);
    });
  }

  private async runTick(): Promise<void> {
    const handle = this.handle;
    if (!handle || this.state !== 'connected') return;
    const connectionId = this.connectionId;

    // Everything the tick draws is read here, before the first await
    const page = this.pages.currentPage();
    const desired = this.desiredButtons(page, handle.info.keyCount);

    let written = 0;
    for (const button of desired) {
      let bitmap: RenderedBitmap;
      try {
        bitmap = await this.renderCache.render(button, page);
      } catch (error) {
        console.error(`[Sync] Failed to render key ${button.slot}:`, error);
        continue;
      }
      if (connectionId !== this.connectionId) return;
      if (this.lastPushed.get(button.slot) === bitmap.hash) continue;

      try {
        await handle.writeKeyImage(button.slot, bitmap.data);
      } catch (error) {
        if (connectionId === this.connectionId) this.handleIoFailure(error);
        return;
      }
      this.lastPushed.set(button.slot, bitmap.hash);
      written++;
      if (this.debugDevice) {
        console.debug(`[Sync] Wrote key ${button.slot} (${bitmap.hash.slice(0, 12)}, ${bitmap.data.length} bytes)`);
      }
    }

    if (written > 0) {
      console.log(`[Sync] Pushed ${written} key(s) for page "${page.title}"`);
    }
    this.renderCache.prune(this.liveHashes());
  }

  // What each physical key should show, overlays applied
  private desiredButtons(page: Page, keyCount: number): Button[] {
    const buttons: Button[] = [];
    for (let slot = 0; slot < keyCount; slot++) {
      const button = page.buttons.find(b => b.slot === slot) ?? blankButton(slot);
      const overlay = this.overlays.get(overlayKey(page.id, slot));
      buttons.push(overlay ? { ...button, label: overlay.text } : button);
    }
    return buttons;
  }

  private liveHashes(): Set<string> {
    const hashes = new Set<string>();
    for (const page of this.store.listPages()) {
      hashes.add(this.renderCache.hashFor(blankButton(0), page));
      for (const button of page.buttons) {
        hashes.add(this.renderCache.hashFor(button, page));
      }
      for (const [key, overlay] of this.overlays) {
        if (!key.startsWith(`${page.id}:`)) continue;
        const slot = Number(key.slice(page.id.length + 1));
        const button = page.buttons.find(b => b.slot === slot) ?? blankButton(slot);
        hashes.add(this.renderCache.hashFor({ ...button, label: overlay.text }, page));
      }
    }
    return hashes;
  }

  // One read of key events; emits `key-pressed` once per physical press
  async pollOnce(): Promise<number[]> {
    const handle = this.handle;
    if (!handle || this.state !== 'connected') return [];
    const connectionId = this.connectionId;

    let events: KeyEvent[];
    try {
      events = await handle.pollEvents(this.pollTimeoutMs);
    } catch (error) {
      if (connectionId === this.connectionId) this.handleIoFailure(error);
      return [];
    }
    if (connectionId !== this.connectionId) return [];

    const pressed: number[] = [];
    for (const event of events) {
      if (!event.pressed) {
        this.held.delete(event.slot);
        continue;
      }
      if (this.held.has(event.slot)) continue;
      this.held.add(event.slot);
      pressed.push(event.slot);
    }

    if (pressed.length > 0) {
      const pageId = this.pages.currentPageId();
      for (const slot of pressed) {
        this.bus.emit('key-pressed', { pageId, slot });
      }
    }
    return pressed;
  }

  private startPolling(): void {
    if (this.polling) return;
    this.polling = this.pollLoop().finally(() => {
      this.polling = null;
    });
  }

  private async pollLoop(): Promise<void> {
    while (this.running && this.state === 'connected') {
      await this.pollOnce();
    }
  }

  async setBrightness(value: unknown): Promise<void> {
    const brightness = validateBrightness(value);
    this.brightness = brightness;
    const handle = this.handle;
    if (!handle || this.state !== 'connected') {
      console.log(`[Sync] Brightness ${brightness}% will apply on connect`);
      return;
    }
    try {
      await handle.setBrightness(brightness);
      console.log(`[Sync] Brightness set to ${brightness}%`);
    } catch (error) {
      this.handleIoFailure(error);
    }
  }

  // Show `text` on a key in place of its label until the TTL runs out or the button changes
  showOverlay(pageId: string, slot: number, text: string, ttlMs: number): void {
    this.clearOverlay(pageId, slot);
    const key = overlayKey(pageId, slot);
    const timer = setTimeout(() => {
      this.overlays.delete(key);
      if (pageId === this.pages.currentPageId()) this.syncInBackground();
    }, ttlMs);
    timer.unref();
    this.overlays.set(key, { text, timer });
    if (pageId === this.pages.currentPageId()) this.syncInBackground();
  }

  overlayText(pageId: string, slot: number): string | null {
    return this.overlays.get(overlayKey(pageId, slot))?.text ?? null;
  }

  private clearOverlay(pageId: string, slot: number): void {
    const key = overlayKey(pageId, slot);
    const overlay = this.overlays.get(key);
    if (overlay) {
      clearTimeout(overlay.timer);
      this.overlays.delete(key);
    }
  }

  // Paint every key black; the next sync tick restores the page
  async clearPanel(): Promise<void> {
    const handle = this.handle;
    if (!handle || this.state !== 'connected') {
      throw new IOError('Device is not connected');
    }
    const connectionId = this.connectionId;
    for (let slot = 0; slot < handle.info.keyCount; slot++) {
      const bitmap = await this.renderCache.render(blankButton(slot), CLEAR_COLORS);
      if (connectionId !== this.connectionId) return;
      try {
        await handle.writeKeyImage(slot, bitmap.data);
      } catch (error) {
        this.handleIoFailure(error);
        throw error;
      }
      this.lastPushed.set(slot, bitmap.hash);
    }
    console.log('[Sync] Cleared all keys');
  }

  getDeviceState(): DeviceState {
    return {
      state: this.state,
      brightness: this.brightness,
      device: this.handle ? { ...this.handle.info } : null,
      lastError: this.lastError,
      reconnectAttempts: this.reconnectAttempts
    };
  }

  private handleIoFailure(error: unknown): void {
    this.lastError = errorMessage(error);
    console.error('[Sync] Device I/O failed:', error);

    const handle = this.handle;
    this.handle = null;
    this.connectionId++;
    this.lastPushed.clear();
    this.held.clear();
    this.setState('disconnected', this.lastError);

    if (handle) {
      handle.close().catch(closeError => {
        console.error('[Sync] Failed to close device handle:', closeError);
      });
    }
    this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    if (!this.running || this.reconnectTimer) return;

    const delay = reconnectDelay(this.reconnectAttempts);
    this.reconnectAttempts++;
    this.setState('reconnecting');
    console.log(`[Sync] Reconnecting in ${delay}ms (attempt ${this.reconnectAttempts})`);

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect().catch(error => {
        console.error('[Sync] Reconnect error:', error);
      });
    }, delay);
  }

  private cancelReconnect(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  private async closeHandle(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    this.connectionId++;
    this.lastPushed.clear();
    this.held.clear();
    if (!handle) return;
    try {
      await handle.close();
    } catch (error) {
      console.error('[Sync] Failed to close device handle:', error);
    }
  }

  private setState(state: ConnectionState, error?: string): void {
    if (this.state === state) return;
    this.state = state;
    this.bus.emit('connectivity-changed', error ? { state, error } : { state });
  }
}
