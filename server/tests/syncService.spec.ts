import { ConfigStore } from '../src/db/configStore';
import { InvalidBrightnessError } from '../src/errors';
import { ConnectionState, CoreEvents, NotificationBus } from '../src/events';
import { PluginRegistry } from '../src/plugins/pluginManager';
import { VirtualDeviceDriver } from '../src/services/deviceService';
import { PageManager } from '../src/services/pageService';
import { RenderCache } from '../src/services/renderService';
import { DeviceSynchronizer, reconnectDelay } from '../src/services/syncService';
import { MemoryPersistence, waitFor } from './helpers';

function setup() {
  const bus = new NotificationBus();
  const store = new ConfigStore({
    persistence: new MemoryPersistence(),
    validator: new PluginRegistry(),
    keyCount: 6,
    bus
  });
  const pages = new PageManager(store, bus);
  const driver = new VirtualDeviceDriver('mini');
  const renderCache = new RenderCache({ geometry: driver.info });
  const sync = new DeviceSynchronizer({ driver, store, pages, renderCache, bus, pollTimeoutMs: 10 });

  const states: ConnectionState[] = [];
  bus.on('connectivity-changed', event => states.push(event.state));
  const presses: CoreEvents['key-pressed'][] = [];
  bus.on('key-pressed', event => presses.push(event));

  const home = store.listPages()[0];
  return { bus, store, pages, driver, renderCache, sync, states, presses, home };
}

describe('DeviceSynchronizer', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.useRealTimers();
    jest.restoreAllMocks();
  });

  describe('Connecting', () => {
    it('should apply brightness and paint every key on connect', async () => {
      const { sync, driver, states } = setup();

      await expect(sync.connect()).resolves.toBe(true);

      expect(states).toEqual(['connecting', 'connected']);
      expect(driver.brightness).toBe(100);
      expect(driver.writeHistory()).toEqual([0, 1, 2, 3, 4, 5]);
      expect(sync.getDeviceState()).toMatchObject({ state: 'connected', brightness: 100, lastError: null });
      expect(sync.getDeviceState().device?.keyCount).toBe(6);
    });

    it('should report a missing device as disconnected', async () => {
      const { sync, driver, states } = setup();
      driver.detach();

      await expect(sync.connect()).resolves.toBe(false);

      expect(states).toEqual(['connecting', 'disconnected']);
      expect(sync.getDeviceState().lastError).toBe('No key panel device found');
    });
  });

  describe('Sync ticks', () => {
    it('should write only keys whose image changed after a page switch', async () => {
      const { sync, driver, store, pages, home } = setup();
      store.setButton(home.id, 0, { label: 'Same' });
      const second = store.createPage('Second');
      store.setButton(second.id, 0, { label: 'Same' });
      store.setButton(second.id, 1, { label: 'New' });
      await sync.connect();
      driver.resetHistory();

      pages.activate(second.id);
      await sync.requestSync();

      expect(driver.writeHistory()).toEqual([1]);
    });

    it('should write nothing when nothing changed', async () => {
      const { sync, driver } = setup();
      await sync.connect();
      driver.resetHistory();

      await sync.requestSync();

      expect(driver.writeHistory()).toEqual([]);
    });

    it('should repaint a key after its button changes', async () => {
      const { sync, driver, store, home } = setup();
      await sync.connect();
      driver.resetHistory();

      store.setButton(home.id, 3, { label: 'Edit' });
      await sync.requestSync();

      expect(driver.writeHistory()).toEqual([3]);
    });

    it('should coalesce requests made during a tick into one follow-up', async () => {
      const { sync, renderCache } = setup();
      await sync.connect();
      const render = jest.spyOn(renderCache, 'render');

      const first = sync.requestSync();
      const second = sync.requestSync();
      const third = sync.requestSync();
      await Promise.all([first, second, third]);

      expect(second).toBe(third);
      expect(render).toHaveBeenCalledTimes(12);
    });

    it('should disconnect on a failed write and repaint every key after reconnecting', async () => {
      const { sync, driver, store, home, states } = setup();
      await sync.connect();
      store.setButton(home.id, 0, { label: 'One' });
      store.setButton(home.id, 1, { label: 'Two' });
      store.setButton(home.id, 2, { label: 'Three' });
      driver.resetHistory();
      driver.injectWriteFailure(1);

      await sync.requestSync();

      expect(driver.writeHistory()).toEqual([0]);
      expect(sync.getDeviceState().state).toBe('disconnected');
      expect(sync.getDeviceState().lastError).toBe('Write to key 1 failed');

      driver.resetHistory();
      await expect(sync.connect()).resolves.toBe(true);

      expect(driver.writeHistory()).toEqual([0, 1, 2, 3, 4, 5]);
      expect(states).toEqual(['connecting', 'connected', 'disconnected', 'connecting', 'connected']);
    });

    it('should show an overlay in place of the label', async () => {
      const { sync, driver, home } = setup();
      await sync.connect();
      driver.resetHistory();

      sync.showOverlay(home.id, 2, '42%', 5000);
      await sync.requestSync();

      expect(sync.overlayText(home.id, 2)).toBe('42%');
      expect(driver.writeHistory()).toEqual([2]);
      await sync.stop();
    });
  });

  describe('Key events', () => {
    it('should emit one press per physical press', async () => {
      const { sync, driver, presses, home } = setup();
      await sync.connect();

      driver.press(2);
      driver.press(2);
      expect(await sync.pollOnce()).toEqual([2]);

      driver.press(2);
      expect(await sync.pollOnce()).toEqual([]);

      driver.release(2);
      driver.press(2);
      expect(await sync.pollOnce()).toEqual([2]);

      expect(presses).toEqual([
        { pageId: home.id, slot: 2 },
        { pageId: home.id, slot: 2 }
      ]);
    });

    it('should report presses against the active page', async () => {
      const { sync, driver, store, pages, presses } = setup();
      const second = store.createPage('Second');
      pages.activate(second.id);
      await sync.connect();

      driver.tap(4);
      await sync.pollOnce();

      expect(presses).toEqual([{ pageId: second.id, slot: 4 }]);
    });
  });

  describe('Brightness', () => {
    it('should reject values outside 0-100 without changing anything', async () => {
      const { sync, driver } = setup();
      await sync.connect();

      for (const value of [101, -1, 50.5, '50', null]) {
        await expect(sync.setBrightness(value)).rejects.toThrow(InvalidBrightnessError);
      }

      expect(sync.getDeviceState().brightness).toBe(100);
      expect(driver.brightness).toBe(100);
    });

    it('should apply brightness immediately when connected', async () => {
      const { sync, driver } = setup();
      await sync.connect();

      await sync.setBrightness(40);

      expect(driver.brightness).toBe(40);
    });

    it('should remember brightness until the next connect', async () => {
      const { sync, driver } = setup();

      await sync.setBrightness(30);
      expect(driver.brightness).toBeNull();

      await sync.connect();
      expect(driver.brightness).toBe(30);
    });
  });

  describe('Reconnecting', () => {
    it('should double the delay up to 30 seconds', () => {
      expect([0, 1, 2, 3, 4, 5, 6, 10].map(reconnectDelay)).toEqual([500, 1000, 2000, 4000, 8000, 16000, 30000, 30000]);
    });

    it('should retry on backoff until the device comes back', async () => {
      jest.useFakeTimers({ doNotFake: ['nextTick', 'setImmediate', 'queueMicrotask'] });
      const { sync, driver, states } = setup();
      driver.detach();

      await sync.start();
      expect(states).toEqual(['connecting', 'disconnected', 'reconnecting']);

      await jest.advanceTimersByTimeAsync(499);
      expect(states).toHaveLength(3);

      await jest.advanceTimersByTimeAsync(1);
      await waitFor(() => states.length === 6);
      expect(states.slice(3)).toEqual(['connecting', 'disconnected', 'reconnecting']);
      expect(sync.getDeviceState().reconnectAttempts).toBe(2);

      driver.attach();
      await jest.advanceTimersByTimeAsync(1000);
      await waitFor(() => sync.getDeviceState().state === 'connected');

      expect(states.slice(6)).toEqual(['connecting', 'connected']);
      expect(driver.openCount).toBe(1);
      expect(sync.getDeviceState().reconnectAttempts).toBe(0);

      await sync.stop();
    });

    it('should cancel a pending retry on stop', async () => {
      jest.useFakeTimers({ doNotFake: ['nextTick', 'setImmediate', 'queueMicrotask'] });
      const { sync, driver, states } = setup();
      driver.detach();
      await sync.start();

      await sync.stop();
      driver.attach();
      await jest.advanceTimersByTimeAsync(60000);

      expect(driver.openCount).toBe(0);
      expect(states).toEqual(['connecting', 'disconnected', 'reconnecting', 'disconnected']);
    });
  });

  describe('Running', () => {
    it('should repaint when the active page switches', async () => {
      const { sync, driver, store, pages } = setup();
      const second = store.createPage('Second', { backgroundColor: '#203040' });
      await sync.start();
      driver.resetHistory();

      pages.activate(second.id);
      await sync.requestSync();

      expect(driver.writeHistory()).toEqual([0, 1, 2, 3, 4, 5]);
      await sync.stop();
    });

    it('should clear an overlay when its button is edited', async () => {
      const { sync, store, home } = setup();
      await sync.start();
      sync.showOverlay(home.id, 1, 'UP', 5000);

      store.setButton(home.id, 1, { label: 'Ping' });

      expect(sync.overlayText(home.id, 1)).toBeNull();
      await sync.stop();
    });
  });
});
