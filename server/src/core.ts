import { AppConfig } from './config';
import { Persistence } from './db';
import { ConfigStore } from './db/configStore';
import { NotificationBus } from './events';
import { builtinPlugins } from './plugins';
import { PluginRegistry } from './plugins/pluginManager';
import { PluginDescriptor } from './plugins/types';
import { DeviceDriver, deviceProfile } from './services/deviceService';
import { ActionDispatcher } from './services/dispatchService';
import { PageManager } from './services/pageService';
import { RenderCache } from './services/renderService';
import { DeviceSynchronizer } from './services/syncService';

export interface CoreOptions {
  config: AppConfig;
  persistence: Persistence;
  driver: DeviceDriver;
  plugins?: PluginDescriptor[];  // Defaults to the built-in plugins
}

// Everything the web layer and the CLI talk to
export interface Core {
  config: AppConfig;
  bus: NotificationBus;
  registry: PluginRegistry;
  store: ConfigStore;
  renderCache: RenderCache;
  pages: PageManager;
  synchronizer: DeviceSynchronizer;
  dispatcher: ActionDispatcher;
  start(): Promise<void>;
  shutdown(): Promise<void>;
}

export function createCore(options: CoreOptions): Core {
  const { config, persistence, driver } = options;
  const geometry = deviceProfile(config.deviceModel);

  const bus = new NotificationBus();
  const registry = new PluginRegistry();
  for (const plugin of options.plugins ?? builtinPlugins()) {
    registry.register(plugin);
  }

  const store = new ConfigStore({ persistence, validator: registry, keyCount: geometry.keyCount, bus });
  const renderCache = new RenderCache({
    geometry,
    maxEntries: config.renderCacheSize,
    iconsDir: config.iconsDir
  });
  const pages = new PageManager(store, bus);
  const synchronizer = new DeviceSynchronizer({
    driver,
    store,
    pages,
    renderCache,
    bus,
    brightness: config.brightness,
    heartbeatIntervalMs: config.heartbeatIntervalMs,
    pollTimeoutMs: config.pollTimeoutMs,
    debugDevice: config.debugDevice
  });
  const dispatcher = new ActionDispatcher({
    store,
    registry,
    bus,
    overlays: synchronizer,
    timeoutMs: config.dispatchTimeoutMs,
    queueSize: config.dispatchQueueSize
  });

  const unsubscribe = bus.on('key-pressed', ({ pageId, slot }) => {
    dispatcher.enqueue(pageId, slot);
  });

  return {
    config,
    bus,
    registry,
    store,
    renderCache,
    pages,
    synchronizer,
    dispatcher,
    start: () => synchronizer.start(),
    async shutdown() {
      unsubscribe();
      await synchronizer.stop();
      await dispatcher.drain();
      pages.dispose();
    }
  };
}
