import { Page } from '../db';
import { ConfigStore } from '../db/configStore';
import { UnknownPageError } from '../errors';
import { NotificationBus } from '../events';

// Tracks which page is shown on the panel
export class PageManager {
  private activePageId: string | null = null;
  private unsubscribe: () => void;

  constructor(private store: ConfigStore, private bus: NotificationBus) {
    this.unsubscribe = bus.on('pages-changed', event => {
      if (event.reason !== 'deleted' || event.pageId !== this.activePageId) return;
      this.activePageId = null;
      const fallback = this.currentPage();
      console.log(`[Pages] Active page was deleted, showing "${fallback.title}"`);
      this.bus.emit('page-switched', { pageId: fallback.id });
    });
  }

  activate(pageId: string): Page {
    if (!this.store.hasPage(pageId)) {
      throw new UnknownPageError(pageId);
    }
    this.activePageId = pageId;
    const page = this.store.getPage(pageId);
    console.log(`[Pages] Switched to "${page.title}"`);
    this.bus.emit('page-switched', { pageId });
    return page;
  }

  // Active page id, falling back to the first page in display order
  currentPageId(): string {
    if (this.activePageId && this.store.hasPage(this.activePageId)) {
      return this.activePageId;
    }
    return this.store.listPages()[0].id;
  }

  currentPage(): Page {
    return this.store.getPage(this.currentPageId());
  }

  nextPage(): Page {
    return this.step(1);
  }

  previousPage(): Page {
    return this.step(-1);
  }

  dispose(): void {
    this.unsubscribe();
  }

  private step(direction: 1 | -1): Page {
    const pages = this.store.listPages();
    const index = pages.findIndex(p => p.id === this.currentPageId());
    const target = pages[(index + direction + pages.length) % pages.length];
    return this.activate(target.id);
  }
}
