import { z } from 'zod';
import { UnknownPluginError, ValidationError } from '../errors';
import { describeIssues, validationIssues } from '../db/schema';
import { ActionValidator } from '../db/configStore';
import { compileConfigSchema } from './schema';
import {
  ActionContext,
  ActionResult,
  PluginConfigValues,
  PluginDescriptor,
  PluginInfo
} from './types';

interface RegisteredPlugin {
  descriptor: PluginDescriptor;
  validator: z.ZodType<PluginConfigValues, z.ZodTypeDef, unknown>;
}

/**
 * Catalog of action types. Looks plugins up by id and validates their config
 * against the declared schema; never looks further into a plugin.
 */
export class PluginRegistry implements ActionValidator {
  private plugins: Map<string, RegisteredPlugin> = new Map();

  // Register a plugin descriptor
  register(descriptor: PluginDescriptor): void {
    if (!descriptor.id) {
      throw new ValidationError(`Plugin ${descriptor.name} must have an id`);
    }
    if (this.plugins.has(descriptor.id)) {
      throw new ValidationError(`Plugin ${descriptor.id} already registered`);
    }

    this.plugins.set(descriptor.id, {
      descriptor,
      validator: compileConfigSchema(descriptor.configSchema)
    });
    console.log(`[Plugins] Registered plugin: ${descriptor.name} (${descriptor.id})`);
  }

  unregister(pluginId: string): boolean {
    const removed = this.plugins.delete(pluginId);
    if (removed) {
      console.log(`[Plugins] Unregistered plugin: ${pluginId}`);
    }
    return removed;
  }

  has(pluginId: string): boolean {
    return this.plugins.has(pluginId);
  }

  // Metadata for every registered plugin, for the editor
  listDescriptors(): PluginInfo[] {
    return Array.from(this.plugins.values()).map(({ descriptor }) => ({
      id: descriptor.id,
      name: descriptor.name,
      description: descriptor.description,
      category: descriptor.category,
      icon: descriptor.icon,
      configSchema: structuredClone(descriptor.configSchema)
    }));
  }

  private lookup(pluginId: string): RegisteredPlugin {
    const plugin = this.plugins.get(pluginId);
    if (!plugin) {
      throw new UnknownPluginError(pluginId);
    }
    return plugin;
  }

  // Validate config against the plugin's schema; returns it with defaults filled in
  validate(pluginId: string, config: unknown): PluginConfigValues {
    const { validator } = this.lookup(pluginId);
    const parsed = validator.safeParse(config ?? {});
    if (!parsed.success) {
      const issues = validationIssues(parsed.error);
      throw new ValidationError(`Invalid config for plugin ${pluginId}: ${describeIssues(issues)}`, issues);
    }
    return parsed.data;
  }

  // Execute a plugin with validated config
  async dispatch(pluginId: string, context: ActionContext, config: PluginConfigValues): Promise<ActionResult> {
    const { descriptor } = this.lookup(pluginId);
    const validated = this.validate(pluginId, config);
    return descriptor.execute(context, validated);
  }
}
