import { z } from 'zod';
import { ConfigProperty, ConfigSchema, PluginConfigValues } from './types';

function propertySchema(name: string, property: ConfigProperty): z.ZodTypeAny {
  switch (property.type) {
    case 'string': {
      let schema = z.string();
      if (property.minLength !== undefined) schema = schema.min(property.minLength);
      if (property.pattern !== undefined) schema = schema.regex(new RegExp(property.pattern), `${name} has an invalid format`);
      const allowed = property.enum;
      if (allowed) {
        return schema.refine(value => allowed.includes(value), {
          message: `Expected one of: ${allowed.join(', ')}`
        });
      }
      return schema;
    }
    case 'integer':
    case 'number': {
      let schema = z.number();
      if (property.type === 'integer') schema = schema.int();
      if (property.minimum !== undefined) schema = schema.min(property.minimum);
      if (property.maximum !== undefined) schema = schema.max(property.maximum);
      return schema;
    }
    case 'boolean':
      return z.boolean();
  }
}

// Build a validator for a plugin's config schema. Unknown keys are rejected,
// missing optional keys take their declared default.
export function compileConfigSchema(schema: ConfigSchema): z.ZodType<PluginConfigValues, z.ZodTypeDef, unknown> {
  const required = new Set(schema.required ?? []);
  const shape: Record<string, z.ZodTypeAny> = {};

  for (const [name, property] of Object.entries(schema.properties)) {
    const base = propertySchema(name, property);
    if (property.default !== undefined) {
      shape[name] = base.default(property.default);
    } else if (required.has(name)) {
      shape[name] = base;
    } else {
      shape[name] = base.optional();
    }
  }

  return z
    .object(shape)
    .strict()
    .transform(values => {
      const config: PluginConfigValues = {};
      for (const [key, value] of Object.entries(values)) {
        if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
          config[key] = value;
        }
      }
      return config;
    });
}
