import * as path from 'path';
import { z } from 'zod';

export const DEVICE_MODELS = ['mini', 'original', 'mk2', 'xl', 'neo', 'plus'] as const;
export type DeviceModel = typeof DEVICE_MODELS[number];

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform(value => value === 'true' || value === '1');

// Environment variables understood by the server
const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  DATA_DIR: z.string().min(1).optional(),
  ICONS_DIR: z.string().min(1).optional(),
  DEVICE_MODEL: z.enum(DEVICE_MODELS).default('mk2'),
  BRIGHTNESS: z.coerce.number().int().min(0).max(100).default(100),
  HEARTBEAT_INTERVAL_MS: z.coerce.number().int().min(1000).default(30000),
  POLL_TIMEOUT_MS: z.coerce.number().int().min(10).default(100),
  DISPATCH_TIMEOUT_MS: z.coerce.number().int().min(100).default(10000),
  DISPATCH_QUEUE_SIZE: z.coerce.number().int().min(1).default(32),
  RENDER_CACHE_SIZE: z.coerce.number().int().min(1).default(256),
  MDNS_ENABLED: booleanFlag.default('true'),
  DEBUG_DEVICE: booleanFlag.default('false')
});

export interface AppConfig {
  port: number;
  dataDir: string;
  iconsDir: string;
  deviceModel: DeviceModel;
  brightness: number;
  heartbeatIntervalMs: number;
  pollTimeoutMs: number;
  dispatchTimeoutMs: number;
  dispatchQueueSize: number;
  renderCacheSize: number;
  mdnsEnabled: boolean;
  debugDevice: boolean;
}

// Parse configuration from the environment, throwing with every problem listed
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const vars = parsed.data;
  const dataDir = path.resolve(vars.DATA_DIR ?? path.join(process.cwd(), 'data'));

  return {
    port: vars.PORT,
    dataDir,
    iconsDir: path.resolve(vars.ICONS_DIR ?? path.join(dataDir, 'icons')),
    deviceModel: vars.DEVICE_MODEL,
    brightness: vars.BRIGHTNESS,
    heartbeatIntervalMs: vars.HEARTBEAT_INTERVAL_MS,
    pollTimeoutMs: vars.POLL_TIMEOUT_MS,
    dispatchTimeoutMs: vars.DISPATCH_TIMEOUT_MS,
    dispatchQueueSize: vars.DISPATCH_QUEUE_SIZE,
    renderCacheSize: vars.RENDER_CACHE_SIZE,
    mdnsEnabled: vars.MDNS_ENABLED,
    debugDevice: vars.DEBUG_DEVICE
  };
}
