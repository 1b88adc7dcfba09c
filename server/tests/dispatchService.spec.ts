import { ConfigStore } from '../src/db/configStore';
import { CoreEvents, NotificationBus } from '../src/events';
import { PluginRegistry } from '../src/plugins/pluginManager';
import { createSystemPlugins } from '../src/plugins/system';
import { ActionResult, PluginDescriptor } from '../src/plugins/types';
import { ActionDispatcher, DispatcherOptions, OVERLAY_TTL_MS } from '../src/services/dispatchService';
import { MemoryPersistence, fakePlugin } from './helpers';

function setup(plugins: PluginDescriptor[], options: Partial<DispatcherOptions> = {}) {
  const bus = new NotificationBus();
  const registry = new PluginRegistry();
  for (const plugin of plugins) registry.register(plugin);
  const store = new ConfigStore({ persistence: new MemoryPersistence(), validator: registry, keyCount: 6, bus });
  const overlays = { showOverlay: jest.fn() };
  const dispatcher = new ActionDispatcher({ store, registry, bus, overlays, timeoutMs: 1000, ...options });

  const dispatched: CoreEvents['action-dispatched'][] = [];
  bus.on('action-dispatched', event => dispatched.push(event));

  const home = store.listPages()[0];
  return { store, registry, dispatcher, overlays, dispatched, home };
}

describe('ActionDispatcher', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('Skipping', () => {
    it('should skip an empty slot', async () => {
      const echo = fakePlugin('test.echo');
      const { dispatcher, dispatched, home } = setup([echo]);

      const status = await dispatcher.onKeyPress(home.id, 3);

      expect(status).toEqual({ status: 'skipped', reason: 'Slot is empty' });
      expect(echo.execute).not.toHaveBeenCalled();
      expect(dispatched).toEqual([{ pageId: home.id, slot: 3, outcome: 'skipped', message: 'Slot is empty' }]);
    });

    it('should not dispatch a disabled button', async () => {
      const echo = fakePlugin('test.echo');
      const { dispatcher, store, home } = setup([echo]);
      store.setButton(home.id, 0, {
        label: 'Off',
        enabled: false,
        action: { type: 'plugin', pluginId: 'test.echo', config: {} }
      });

      const status = await dispatcher.onKeyPress(home.id, 0);

      expect(status).toEqual({ status: 'skipped', reason: 'Button is disabled' });
      expect(echo.execute).not.toHaveBeenCalled();
    });

    it('should not dispatch a button without an action', async () => {
      const echo = fakePlugin('test.echo');
      const { dispatcher, store, home } = setup([echo]);
      store.setButton(home.id, 1, { label: 'Label only' });

      const status = await dispatcher.onKeyPress(home.id, 1);

      expect(status).toEqual({ status: 'skipped', reason: 'Button has no action' });
      expect(echo.execute).not.toHaveBeenCalled();
    });
  });

  describe('Dispatching', () => {
    it('should call system.shutdown exactly once for one press', async () => {
      const run = jest.fn().mockResolvedValue({ exitCode: 0, stdout: '', stderr: '' });
      const probe = {
        cpuPercent: async () => 0,
        cpuTemperature: async () => null,
        memory: () => ({ total: 1, free: 1 }),
        disk: async () => ({ total: 1, free: 1 })
      };
      const plugins = createSystemPlugins({ run, probe });
      const shutdown = plugins.find(p => p.id === 'system.shutdown');
      if (!shutdown) throw new Error('system.shutdown missing');
      const execute = jest.spyOn(shutdown, 'execute');
      const { dispatcher, store } = setup(plugins);

      const main = store.createPage('Main');
      store.setButton(main.id, 0, { label: 'Off', action: { type: 'plugin', pluginId: 'system.shutdown', config: {} } });
      const status = await dispatcher.onKeyPress(main.id, 0);

      expect(status).toEqual({ status: 'succeeded', message: 'Shutting down' });
      expect(execute).toHaveBeenCalledTimes(1);
      expect(run).toHaveBeenCalledTimes(1);
      expect(run).toHaveBeenCalledWith('sudo', ['shutdown', '-h', 'now'], { signal: expect.any(AbortSignal) });
    });

    it('should pass the button context and validated config to the plugin', async () => {
      const echo = fakePlugin('test.echo');
      const { dispatcher, store, home } = setup([echo]);
      store.setButton(home.id, 2, { label: 'Echo', action: { type: 'plugin', pluginId: 'test.echo', config: { target: 'desk' } } });

      await dispatcher.onKeyPress(home.id, 2);

      expect(echo.execute).toHaveBeenCalledWith(
        expect.objectContaining({ pageId: home.id, slot: 2, label: 'Echo' }),
        { target: 'desk', repeat: 1 }
      );
    });

    it('should show display text on the pressed key', async () => {
      const { dispatcher, store, overlays, home } = setup([
        fakePlugin('test.cpu', async () => ({ success: true, message: 'CPU 42%', display: 'CPU\n42%' }))
      ]);
      store.setButton(home.id, 4, { label: 'CPU', action: { type: 'plugin', pluginId: 'test.cpu', config: {} } });

      const status = await dispatcher.onKeyPress(home.id, 4);

      expect(status).toEqual({ status: 'succeeded', message: 'CPU 42%', display: 'CPU\n42%' });
      expect(overlays.showOverlay).toHaveBeenCalledWith(home.id, 4, 'CPU\n42%', OVERLAY_TTL_MS);
    });

    it('should report a plugin that returns failure', async () => {
      const { dispatcher, store, dispatched, home } = setup([
        fakePlugin('test.ping', async () => ({ success: false, message: 'host unreachable' }))
      ]);
      store.setButton(home.id, 0, { action: { type: 'plugin', pluginId: 'test.ping', config: {} } });

      const status = await dispatcher.onKeyPress(home.id, 0);

      expect(status).toEqual({ status: 'failed', message: 'host unreachable' });
      expect(dispatched).toEqual([
        { pageId: home.id, slot: 0, pluginId: 'test.ping', outcome: 'failed', message: 'host unreachable' }
      ]);
    });

    it('should contain a plugin that throws', async () => {
      const { dispatcher, store, home } = setup([
        fakePlugin('test.broken', async () => {
          throw new Error('boom');
        }),
        fakePlugin('test.echo')
      ]);
      store.setButton(home.id, 0, { action: { type: 'plugin', pluginId: 'test.broken', config: {} } });
      store.setButton(home.id, 1, { action: { type: 'plugin', pluginId: 'test.echo', config: {} } });

      await expect(dispatcher.onKeyPress(home.id, 0)).resolves.toEqual({ status: 'failed', message: 'boom' });
      await expect(dispatcher.onKeyPress(home.id, 1)).resolves.toEqual({ status: 'succeeded' });
    });

    it('should fail a press on a page that no longer exists', async () => {
      const { dispatcher } = setup([]);

      await expect(dispatcher.onKeyPress('gone', 0)).resolves.toEqual({ status: 'failed', message: 'Page gone not found' });
    });

    it('should time out a hung plugin and abort its signal', async () => {
      const seen: { signal?: AbortSignal } = {};
      const { dispatcher, store, home } = setup(
        [
          fakePlugin('test.hang', context => {
            seen.signal = context.signal;
            return new Promise<ActionResult>(() => undefined);
          })
        ],
        { timeoutMs: 20 }
      );
      store.setButton(home.id, 0, { action: { type: 'plugin', pluginId: 'test.hang', config: {} } });

      const status = await dispatcher.onKeyPress(home.id, 0);

      expect(status).toEqual({ status: 'failed', message: 'Plugin test.hang did not finish within 20ms' });
      expect(seen.signal?.aborted).toBe(true);
    });
  });

  describe('Queue', () => {
    it('should drop presses beyond the queue size', async () => {
      const slow = fakePlugin('test.slow', () => new Promise<ActionResult>(resolve => setTimeout(() => resolve({ success: true }), 5)));
      const { dispatcher, store, home } = setup([slow], { queueSize: 2, concurrency: 1 });
      store.setButton(home.id, 0, { action: { type: 'plugin', pluginId: 'test.slow', config: {} } });

      const accepted = [1, 2, 3, 4].map(() => dispatcher.enqueue(home.id, 0));
      await dispatcher.drain();

      expect(accepted).toEqual([true, true, true, false]);
      expect(slow.execute).toHaveBeenCalledTimes(3);
      expect(console.warn).toHaveBeenCalledWith('[Dispatch] Queue full (2), dropping press on key 0');
    });

    it('should keep working after a failed dispatch', async () => {
      const { dispatcher, store, dispatched, home } = setup(
        [
          fakePlugin('test.broken', async () => {
            throw new Error('boom');
          }),
          fakePlugin('test.echo')
        ],
        { concurrency: 1 }
      );
      store.setButton(home.id, 0, { action: { type: 'plugin', pluginId: 'test.broken', config: {} } });
      store.setButton(home.id, 1, { action: { type: 'plugin', pluginId: 'test.echo', config: {} } });

      dispatcher.enqueue(home.id, 0);
      dispatcher.enqueue(home.id, 1);
      await dispatcher.drain();

      expect(dispatched.map(event => [event.slot, event.outcome])).toEqual([
        [0, 'failed'],
        [1, 'succeeded']
      ]);
      expect(dispatcher.pending()).toBe(0);
    });

    it('should drain immediately when idle', async () => {
      const { dispatcher } = setup([]);

      await expect(dispatcher.drain()).resolves.toBeUndefined();
    });
  });
});
