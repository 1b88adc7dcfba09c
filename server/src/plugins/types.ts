import { PluginConfigValues } from '../db';

export { PluginConfigValues } from '../db';

// One property of a plugin's config schema
export type ConfigProperty =
  | {
      type: 'string';
      description?: string;
      default?: string;
      enum?: readonly string[];
      pattern?: string;
      minLength?: number;
    }
  | {
      type: 'integer' | 'number';
      description?: string;
      default?: number;
      minimum?: number;
      maximum?: number;
    }
  | {
      type: 'boolean';
      description?: string;
      default?: boolean;
    };

// JSON-schema-like description of a plugin's config, also rendered by the editor
export interface ConfigSchema {
  type: 'object';
  properties: Record<string, ConfigProperty>;
  required?: readonly string[];
}

// Context passed to plugins when a key is pressed
export interface ActionContext {
  pageId: string;
  slot: number;
  label: string;
  timestamp: number;
  signal: AbortSignal;  // Aborted when the dispatch times out
}

// Result returned from plugin execution
export interface ActionResult {
  success: boolean;
  message?: string;
  display?: string;  // Short text shown on the pressed key for a while
}

// Plugin descriptor: static metadata plus the single execute capability
export interface PluginDescriptor {
  id: string;           // Unique plugin identifier, e.g. "system.shutdown"
  name: string;         // Display name
  description: string;
  category: string;
  icon?: string;
  configSchema: ConfigSchema;
  execute(context: ActionContext, config: PluginConfigValues): Promise<ActionResult>;
}

// Descriptor as listed to the editor
export type PluginInfo = Omit<PluginDescriptor, 'execute'>;

export const EMPTY_SCHEMA: ConfigSchema = { type: 'object', properties: {} };

// Typed reads of validated config values
export function stringSetting(config: PluginConfigValues, key: string, fallback = ''): string {
  const value = config[key];
  return typeof value === 'string' ? value : fallback;
}

export function numberSetting(config: PluginConfigValues, key: string, fallback: number): number {
  const value = config[key];
  return typeof value === 'number' ? value : fallback;
}

export function booleanSetting(config: PluginConfigValues, key: string, fallback: boolean): boolean {
  const value = config[key];
  return typeof value === 'boolean' ? value : fallback;
}
