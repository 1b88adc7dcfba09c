import { ConfigSnapshot } from '../src/db';
import { ConfigStore } from '../src/db/configStore';
import {
  IOError,
  LastPageError,
  NoFreeSlotError,
  UnknownPageError,
  UnknownPluginError,
  ValidationError
} from '../src/errors';
import { CoreEvents, NotificationBus } from '../src/events';
import { PluginRegistry } from '../src/plugins/pluginManager';
import { MemoryPersistence, fakePlugin } from './helpers';

function createStore(persistence = new MemoryPersistence(), bus = new NotificationBus()) {
  const registry = new PluginRegistry();
  registry.register(fakePlugin('test.echo'));
  const store = new ConfigStore({ persistence, validator: registry, keyCount: 6, bus });
  return { store, persistence, bus };
}

describe('ConfigStore', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('Startup', () => {
    it('should create and save a default page when nothing is stored', () => {
      const { store, persistence } = createStore();

      const pages = store.listPages();
      expect(pages).toHaveLength(1);
      expect(pages[0]).toMatchObject({
        title: 'Home',
        order: 0,
        backgroundColor: '#000000',
        textColor: '#ffffff',
        buttons: []
      });
      expect(persistence.saves).toBe(1);
    });

    it('should start from defaults without saving when the stored config cannot be read', () => {
      const persistence = new MemoryPersistence();
      jest.spyOn(persistence, 'load').mockImplementation(() => {
        throw new IOError('Invalid config in pages.json');
      });

      const { store } = createStore(persistence);

      expect(store.listPages().map(p => p.title)).toEqual(['Home']);
      expect(persistence.saves).toBe(0);
    });
  });

  describe('Durability', () => {
    it('should reload exactly the last persisted state', () => {
      const persistence = new MemoryPersistence();
      const { store } = createStore(persistence);
      const home = store.listPages()[0];

      const media = store.createPage('Media', { backgroundColor: '#112233' });
      store.setButton(home.id, 0, { label: 'Echo', action: { type: 'plugin', pluginId: 'test.echo', config: { repeat: 2 } } });
      store.setButton(home.id, 1, { label: 'Off', enabled: false });
      store.setButton(media.id, 3, { label: 'Play', textColor: '#AABBCC' });
      store.swapButtons(home.id, 0, 5);
      store.clearButton(home.id, 1);
      store.updatePage(media.id, { title: 'Music' });

      const before = store.snapshotCopy();
      const { store: reloaded } = createStore(persistence);

      expect(reloaded.snapshotCopy()).toEqual(before);
      expect(reloaded.getButton(home.id, 5)).toEqual({
        slot: 5,
        label: 'Echo',
        fontSize: 14,
        enabled: true,
        action: { type: 'plugin', pluginId: 'test.echo', config: { target: 'all', repeat: 2 } }
      });
      expect(reloaded.getPage(media.id).title).toBe('Music');
    });

    it('should not keep a mutation whose save failed', () => {
      const { store, persistence } = createStore();
      const home = store.listPages()[0];
      persistence.failSaves = true;

      expect(() => store.createPage('Extra')).toThrow(IOError);
      expect(() => store.setButton(home.id, 0, { label: 'A' })).toThrow(IOError);

      expect(store.listPages()).toHaveLength(1);
      expect(store.getButton(home.id, 0)).toBeNull();
    });
  });

  describe('setButton', () => {
    it('should fill in plugin config defaults', () => {
      const { store } = createStore();
      const home = store.listPages()[0];

      const button = store.setButton(home.id, 2, {
        label: 'Go',
        action: { type: 'plugin', pluginId: 'test.echo', config: {} }
      });

      expect(button.action).toEqual({ type: 'plugin', pluginId: 'test.echo', config: { target: 'all', repeat: 1 } });
    });

    it('should never change stored state when the plugin config is invalid', () => {
      const { store, persistence } = createStore();
      const home = store.listPages()[0];
      store.setButton(home.id, 0, { label: 'Echo', action: { type: 'plugin', pluginId: 'test.echo', config: { repeat: 2 } } });
      const before = store.snapshotCopy();
      const saves = persistence.saves;

      expect(() =>
        store.setButton(home.id, 0, { label: 'Broken', action: { type: 'plugin', pluginId: 'test.echo', config: { repeat: 9 } } })
      ).toThrow(ValidationError);
      expect(() =>
        store.setButton(home.id, 0, { label: 'Broken', action: { type: 'plugin', pluginId: 'test.echo', config: { volume: 3 } } })
      ).toThrow(ValidationError);

      expect(store.snapshotCopy()).toEqual(before);
      expect(persistence.saves).toBe(saves);
    });

    it('should reject an unknown plugin', () => {
      const { store } = createStore();
      const home = store.listPages()[0];

      expect(() =>
        store.setButton(home.id, 0, { action: { type: 'plugin', pluginId: 'missing.plugin', config: {} } })
      ).toThrow(UnknownPluginError);
      expect(store.getButton(home.id, 0)).toBeNull();
    });

    it('should reject slots outside the panel', () => {
      const { store } = createStore();
      const home = store.listPages()[0];

      expect(() => store.setButton(home.id, 6, { label: 'X' })).toThrow(ValidationError);
      expect(() => store.setButton(home.id, -1, { label: 'X' })).toThrow(ValidationError);
      expect(() => store.getButton(home.id, 1.5)).toThrow(ValidationError);
    });

    it('should reject an unknown page', () => {
      const { store } = createStore();

      expect(() => store.setButton('nope', 0, { label: 'X' })).toThrow(UnknownPageError);
    });

    it('should lowercase colors and drop empty overrides', () => {
      const { store } = createStore();
      const home = store.listPages()[0];

      const button = store.setButton(home.id, 1, { label: 'Red', backgroundColor: '#FF0000', textColor: null });

      expect(button).toEqual({
        slot: 1,
        label: 'Red',
        fontSize: 14,
        backgroundColor: '#ff0000',
        enabled: true,
        action: { type: 'none' }
      });
    });

    it('should emit button-updated after the change is saved', () => {
      const { store, bus } = createStore();
      const home = store.listPages()[0];
      const events: CoreEvents['button-updated'][] = [];
      bus.on('button-updated', event => events.push(event));

      store.setButton(home.id, 4, { label: 'Hi' });

      expect(events).toEqual([{ pageId: home.id, slot: 4 }]);
    });
  });

  describe('Pages', () => {
    it('should fail to delete the only page and keep the page count', () => {
      const { store } = createStore();
      const home = store.listPages()[0];

      expect(() => store.deletePage(home.id)).toThrow(LastPageError);
      expect(store.listPages()).toHaveLength(1);
    });

    it('should fail to delete an unknown page', () => {
      const { store } = createStore();

      expect(() => store.deletePage('nope')).toThrow(UnknownPageError);
    });

    it('should append new pages in display order', () => {
      const { store } = createStore();

      store.createPage('Second');
      store.createPage('Third');

      expect(store.listPages().map(p => [p.title, p.order])).toEqual([
        ['Home', 0],
        ['Second', 1],
        ['Third', 2]
      ]);
    });

    it('should reorder pages and renumber them', () => {
      const { store } = createStore();
      const second = store.createPage('Second');
      store.createPage('Third');

      const pages = store.reorderPage(second.id, 0);

      expect(pages.map(p => [p.title, p.order])).toEqual([
        ['Second', 0],
        ['Home', 1],
        ['Third', 2]
      ]);
      expect(() => store.reorderPage(second.id, 3)).toThrow(ValidationError);
    });

    it('should reject a blank title', () => {
      const { store } = createStore();

      expect(() => store.createPage('   ')).toThrow(ValidationError);
      expect(store.listPages()).toHaveLength(1);
    });
  });

  describe('swapButtons', () => {
    it('should exchange full configurations and keep slots unique', () => {
      const { store } = createStore();
      const home = store.listPages()[0];
      store.setButton(home.id, 0, {
        label: 'Echo',
        backgroundColor: '#123456',
        action: { type: 'plugin', pluginId: 'test.echo', config: { target: 'lamp' } }
      });
      store.setButton(home.id, 3, { label: 'Quiet', textColor: '#abcdef', fontSize: 20 });

      store.swapButtons(home.id, 0, 3);

      expect(store.getButton(home.id, 0)).toEqual({
        slot: 0,
        label: 'Quiet',
        fontSize: 20,
        textColor: '#abcdef',
        enabled: true,
        action: { type: 'none' }
      });
      expect(store.getButton(home.id, 3)).toEqual({
        slot: 3,
        label: 'Echo',
        fontSize: 14,
        backgroundColor: '#123456',
        enabled: true,
        action: { type: 'plugin', pluginId: 'test.echo', config: { target: 'lamp', repeat: 1 } }
      });
      const slots = store.getPage(home.id).buttons.map(b => b.slot);
      expect(slots).toEqual([0, 3]);
    });

    it('should move a button into an empty slot', () => {
      const { store } = createStore();
      const home = store.listPages()[0];
      store.setButton(home.id, 1, { label: 'Only' });

      store.swapButtons(home.id, 1, 4);

      expect(store.getButton(home.id, 1)).toBeNull();
      expect(store.getButton(home.id, 4)?.label).toBe('Only');
    });
  });

  describe('moveButton', () => {
    it('should move into the first free slot of the destination page', () => {
      const { store } = createStore();
      const home = store.listPages()[0];
      const other = store.createPage('Other');
      store.setButton(other.id, 0, { label: 'Taken' });
      store.setButton(other.id, 2, { label: 'Taken too' });
      store.setButton(home.id, 5, { label: 'Mover' });

      const slot = store.moveButton(home.id, 5, other.id);

      expect(slot).toBe(1);
      expect(store.getButton(home.id, 5)).toBeNull();
      expect(store.getButton(other.id, 1)?.label).toBe('Mover');
    });

    it('should reject a move into a full page and change nothing', () => {
      const { store } = createStore();
      const home = store.listPages()[0];
      const full = store.createPage('Full');
      for (let slot = 0; slot < 6; slot++) {
        store.setButton(full.id, slot, { label: `K${slot}` });
      }
      store.setButton(home.id, 0, { label: 'Mover' });
      const before: ConfigSnapshot = store.snapshotCopy();

      expect(() => store.moveButton(home.id, 0, full.id)).toThrow(NoFreeSlotError);
      expect(store.snapshotCopy()).toEqual(before);
    });

    it('should reject moving an empty slot', () => {
      const { store } = createStore();
      const home = store.listPages()[0];
      const other = store.createPage('Other');

      expect(() => store.moveButton(home.id, 0, other.id)).toThrow(ValidationError);
    });
  });
});
