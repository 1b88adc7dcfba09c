import * as fs from 'fs';
import * as path from 'path';
import { IOError, errorMessage } from '../errors';
import { configSnapshotSchema } from './schema';

export const DEFAULT_BACKGROUND = '#000000';
export const DEFAULT_TEXT_COLOR = '#ffffff';
export const DEFAULT_FONT_SIZE = 14;

// Values accepted by a plugin config, after schema validation
export type PluginConfigValues = Record<string, string | number | boolean>;

// What a button does when pressed
export type Action =
  | { type: 'none' }
  | { type: 'plugin'; pluginId: string; config: PluginConfigValues };

// Button in one slot of a page
export interface Button {
  slot: number;
  label: string;
  icon?: string;
  fontSize: number;
  backgroundColor?: string;  // Falls back to the page default
  textColor?: string;        // Falls back to the page default
  enabled: boolean;
  action: Action;
}

// Page of buttons sharing default colors
export interface Page {
  id: string;
  title: string;
  order: number;
  backgroundColor: string;
  textColor: string;
  buttons: Button[];  // Sorted by slot, at most one per slot
}

// Everything persisted to pages.json
export interface ConfigSnapshot {
  version: 1;
  pages: Page[];
}

// Durable storage for the config snapshot
export interface Persistence {
  load(): ConfigSnapshot | null;
  save(snapshot: ConfigSnapshot): void;
}

// Snapshot persisted as pretty-printed JSON, written to a temp file and renamed into place
export class JsonFilePersistence implements Persistence {
  readonly filePath: string;

  constructor(dataDir: string, fileName = 'pages.json') {
    this.filePath = path.join(dataDir, fileName);
  }

  load(): ConfigSnapshot | null {
    if (!fs.existsSync(this.filePath)) {
      return null;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
    } catch (error) {
      throw new IOError(`Failed to read ${this.filePath}: ${errorMessage(error)}`, { cause: error });
    }

    const parsed = configSnapshotSchema.safeParse(raw);
    if (!parsed.success) {
      const first = parsed.error.issues[0];
      throw new IOError(`Invalid config in ${this.filePath}: ${first.path.join('.')} ${first.message}`);
    }
    return parsed.data;
  }

  save(snapshot: ConfigSnapshot): void {
    const tempPath = `${this.filePath}.tmp`;
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(tempPath, JSON.stringify(snapshot, null, 2));
      fs.renameSync(tempPath, this.filePath);
    } catch (error) {
      throw new IOError(`Failed to save ${this.filePath}: ${errorMessage(error)}`, { cause: error });
    }
  }
}
