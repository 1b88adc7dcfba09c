import * as crypto from 'crypto';
import { z } from 'zod';
import {
  IOError,
  LastPageError,
  NoFreeSlotError,
  UnknownPageError,
  ValidationError,
  errorMessage
} from '../errors';
import { NotificationBus } from '../events';
import {
  Action,
  Button,
  ConfigSnapshot,
  DEFAULT_BACKGROUND,
  DEFAULT_TEXT_COLOR,
  Page,
  Persistence,
  PluginConfigValues
} from './index';
import {
  ButtonInput,
  PagePatch,
  buttonInputSchema,
  describeIssues,
  pageInputSchema,
  pagePatchSchema,
  validationIssues
} from './schema';

// Checks a plugin action's config; implemented by the plugin registry
export interface ActionValidator {
  validate(pluginId: string, config: unknown): PluginConfigValues;
}

export interface ConfigStoreOptions {
  persistence: Persistence;
  validator: ActionValidator;
  keyCount: number;
  bus?: NotificationBus;
}

function createDefaultSnapshot(): ConfigSnapshot {
  return {
    version: 1,
    pages: [
      {
        id: crypto.randomUUID(),
        title: 'Home',
        order: 0,
        backgroundColor: DEFAULT_BACKGROUND,
        textColor: DEFAULT_TEXT_COLOR,
        buttons: []
      }
    ]
  };
}

function parseOrThrow<T extends z.ZodTypeAny>(schema: T, value: unknown, what: string): z.output<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issues = validationIssues(parsed.error);
    throw new ValidationError(`Invalid ${what}: ${describeIssues(issues)}`, issues);
  }
  return parsed.data;
}

function bySlot(a: Button, b: Button): number {
  return a.slot - b.slot;
}

function byOrder(a: Page, b: Page): number {
  return a.order - b.order;
}

/**
 * Pages and buttons, persisted on every mutation.
 *
 * Each mutation works on a copy of the snapshot, saves it, and only then
 * replaces the live state, so a rejected or failed call leaves nothing
 * behind. Reads hand out copies.
 */
export class ConfigStore {
  readonly keyCount: number;
  private snapshot: ConfigSnapshot;
  private persistence: Persistence;
  private validator: ActionValidator;
  private bus: NotificationBus | null;

  constructor(options: ConfigStoreOptions) {
    this.keyCount = options.keyCount;
    this.persistence = options.persistence;
    this.validator = options.validator;
    this.bus = options.bus ?? null;
    this.snapshot = this.loadInitial();
  }

  private loadInitial(): ConfigSnapshot {
    try {
      const loaded = this.persistence.load();
      if (loaded) {
        console.log(`[Config] Loaded ${loaded.pages.length} pages from storage`);
        return loaded;
      }
    } catch (error) {
      // Keep the unreadable file untouched until the next edit overwrites it
      console.error('[Config] Failed to load pages, starting with defaults:', error);
      return createDefaultSnapshot();
    }

    const initial = createDefaultSnapshot();
    try {
      this.persistence.save(initial);
      console.log('[Config] Created default page');
    } catch (error) {
      console.error('[Config] Failed to save default page:', error);
    }
    return initial;
  }

  private commit(mutate: (draft: ConfigSnapshot) => void): void {
    const draft = structuredClone(this.snapshot);
    mutate(draft);
    try {
      this.persistence.save(draft);
    } catch (error) {
      if (error instanceof IOError) throw error;
      throw new IOError(`Failed to save config: ${errorMessage(error)}`, { cause: error });
    }
    this.snapshot = draft;
  }

  private findPage(snapshot: ConfigSnapshot, pageId: string): Page {
    const page = snapshot.pages.find(p => p.id === pageId);
    if (!page) {
      throw new UnknownPageError(pageId);
    }
    return page;
  }

  private assertSlot(slot: number): void {
    if (!Number.isInteger(slot) || slot < 0 || slot >= this.keyCount) {
      throw new ValidationError(`Slot must be an integer between 0 and ${this.keyCount - 1}`, [
        { path: 'slot', message: `Out of range: ${slot}` }
      ]);
    }
  }

  // Full copy of the persisted state
  snapshotCopy(): ConfigSnapshot {
    return structuredClone(this.snapshot);
  }

  listPages(): Page[] {
    return structuredClone(this.snapshot.pages).sort(byOrder);
  }

  hasPage(pageId: string): boolean {
    return this.snapshot.pages.some(p => p.id === pageId);
  }

  getPage(pageId: string): Page {
    return structuredClone(this.findPage(this.snapshot, pageId));
  }

  createPage(title: string, colors: { backgroundColor?: string; textColor?: string } = {}): Page {
    const input = parseOrThrow(pageInputSchema, { title, ...colors }, 'page');
    const nextOrder = Math.max(...this.snapshot.pages.map(p => p.order)) + 1;
    const page: Page = {
      id: crypto.randomUUID(),
      title: input.title,
      order: nextOrder,
      backgroundColor: input.backgroundColor ?? DEFAULT_BACKGROUND,
      textColor: input.textColor ?? DEFAULT_TEXT_COLOR,
      buttons: []
    };

    this.commit(draft => {
      draft.pages.push(page);
    });
    console.log(`[Config] Created page "${page.title}" (${page.id})`);
    this.bus?.emit('pages-changed', { reason: 'created', pageId: page.id });
    return structuredClone(page);
  }

  updatePage(pageId: string, patch: PagePatch): Page {
    this.findPage(this.snapshot, pageId);
    const values = parseOrThrow(pagePatchSchema, patch, 'page');

    this.commit(draft => {
      const page = this.findPage(draft, pageId);
      if (values.title !== undefined) page.title = values.title;
      if (values.backgroundColor !== undefined) page.backgroundColor = values.backgroundColor;
      if (values.textColor !== undefined) page.textColor = values.textColor;
    });
    this.bus?.emit('pages-changed', { reason: 'updated', pageId });
    return this.getPage(pageId);
  }

  // Move a page to a position in display order
  reorderPage(pageId: string, index: number): Page[] {
    this.findPage(this.snapshot, pageId);
    if (!Number.isInteger(index) || index < 0 || index >= this.snapshot.pages.length) {
      throw new ValidationError(`Index must be between 0 and ${this.snapshot.pages.length - 1}`, [
        { path: 'index', message: `Out of range: ${index}` }
      ]);
    }

    this.commit(draft => {
      const ordered = [...draft.pages].sort(byOrder);
      const from = ordered.findIndex(p => p.id === pageId);
      const [moved] = ordered.splice(from, 1);
      ordered.splice(index, 0, moved);
      ordered.forEach((page, position) => {
        page.order = position;
      });
    });
    this.bus?.emit('pages-changed', { reason: 'reordered', pageId });
    return this.listPages();
  }

  deletePage(pageId: string): void {
    const page = this.findPage(this.snapshot, pageId);
    if (this.snapshot.pages.length === 1) {
      throw new LastPageError(pageId);
    }

    this.commit(draft => {
      draft.pages = draft.pages.filter(p => p.id !== pageId);
    });
    console.log(`[Config] Deleted page "${page.title}" (${pageId})`);
    this.bus?.emit('pages-changed', { reason: 'deleted', pageId });
  }

  // Button in a slot, or null for an empty slot
  getButton(pageId: string, slot: number): Button | null {
    this.assertSlot(slot);
    const button = this.findPage(this.snapshot, pageId).buttons.find(b => b.slot === slot);
    return button ? structuredClone(button) : null;
  }

  setButton(pageId: string, slot: number, input: ButtonInput): Button {
    this.findPage(this.snapshot, pageId);
    this.assertSlot(slot);

    const values = parseOrThrow(buttonInputSchema, input, 'button config');
    let action: Action = { type: 'none' };
    if (values.action.type === 'plugin') {
      const config = this.validator.validate(values.action.pluginId, values.action.config);
      action = { type: 'plugin', pluginId: values.action.pluginId, config };
    }

    const button: Button = {
      slot,
      label: values.label,
      fontSize: values.fontSize,
      enabled: values.enabled,
      action
    };
    if (values.icon) button.icon = values.icon;
    if (values.backgroundColor) button.backgroundColor = values.backgroundColor;
    if (values.textColor) button.textColor = values.textColor;

    this.commit(draft => {
      const page = this.findPage(draft, pageId);
      page.buttons = page.buttons.filter(b => b.slot !== slot);
      page.buttons.push(button);
      page.buttons.sort(bySlot);
    });
    this.bus?.emit('button-updated', { pageId, slot });
    return structuredClone(button);
  }

  // Returns false when the slot was already empty
  clearButton(pageId: string, slot: number): boolean {
    this.assertSlot(slot);
    const page = this.findPage(this.snapshot, pageId);
    if (!page.buttons.some(b => b.slot === slot)) {
      return false;
    }

    this.commit(draft => {
      const target = this.findPage(draft, pageId);
      target.buttons = target.buttons.filter(b => b.slot !== slot);
    });
    this.bus?.emit('button-updated', { pageId, slot });
    return true;
  }

  // Exchange everything in two slots; either may be empty
  swapButtons(pageId: string, slotA: number, slotB: number): void {
    this.findPage(this.snapshot, pageId);
    this.assertSlot(slotA);
    this.assertSlot(slotB);
    if (slotA === slotB) return;

    this.commit(draft => {
      const page = this.findPage(draft, pageId);
      for (const button of page.buttons) {
        if (button.slot === slotA) button.slot = slotB;
        else if (button.slot === slotB) button.slot = slotA;
      }
      page.buttons.sort(bySlot);
    });
    this.bus?.emit('button-updated', { pageId, slot: slotA });
    this.bus?.emit('button-updated', { pageId, slot: slotB });
  }

  // Move a button into the first free slot of another page; returns that slot
  moveButton(srcPageId: string, srcSlot: number, dstPageId: string): number {
    this.assertSlot(srcSlot);
    const source = this.findPage(this.snapshot, srcPageId);
    const destination = this.findPage(this.snapshot, dstPageId);
    if (!source.buttons.some(b => b.slot === srcSlot)) {
      throw new ValidationError(`No button in slot ${srcSlot} of page ${srcPageId}`, [
        { path: 'slot', message: 'Slot is empty' }
      ]);
    }

    const used = new Set(destination.buttons.map(b => b.slot));
    if (srcPageId === dstPageId) used.delete(srcSlot);
    let freeSlot = -1;
    for (let slot = 0; slot < this.keyCount; slot++) {
      if (!used.has(slot)) {
        freeSlot = slot;
        break;
      }
    }
    if (freeSlot === -1) {
      throw new NoFreeSlotError(dstPageId);
    }

    this.commit(draft => {
      const from = this.findPage(draft, srcPageId);
      const button = from.buttons.find(b => b.slot === srcSlot);
      if (!button) return;
      from.buttons = from.buttons.filter(b => b !== button);
      const to = this.findPage(draft, dstPageId);
      to.buttons.push({ ...button, slot: freeSlot });
      to.buttons.sort(bySlot);
    });
    this.bus?.emit('button-updated', { pageId: srcPageId, slot: srcSlot });
    this.bus?.emit('button-updated', { pageId: dstPageId, slot: freeSlot });
    return freeSlot;
  }
}
