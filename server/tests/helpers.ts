import { AppConfig, loadConfig } from '../src/config';
import { ConfigSnapshot, Persistence } from '../src/db';
import { configSnapshotSchema } from '../src/db/schema';
import { IOError } from '../src/errors';
import { PluginDescriptor } from '../src/plugins/types';

// Persistence kept in memory; saved snapshots are serialized like the file would be
export class MemoryPersistence implements Persistence {
  stored: string | null = null;
  saves = 0;
  failSaves = false;

  constructor(initial?: ConfigSnapshot) {
    if (initial) this.stored = JSON.stringify(initial);
  }

  load(): ConfigSnapshot | null {
    return this.stored === null ? null : configSnapshotSchema.parse(JSON.parse(this.stored));
  }

  save(snapshot: ConfigSnapshot): void {
    if (this.failSaves) {
      throw new IOError('disk full');
    }
    this.stored = JSON.stringify(snapshot);
    this.saves++;
  }
}

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    ...loadConfig({ DATA_DIR: '/tmp/keypanel-test', MDNS_ENABLED: 'false' }),
    ...overrides
  };
}

// Plugin whose execute is a jest mock
export function fakePlugin(
  id: string,
  execute: PluginDescriptor['execute'] = async () => ({ success: true })
): PluginDescriptor {
  return {
    id,
    name: id,
    description: `Test plugin ${id}`,
    category: 'test',
    configSchema: {
      type: 'object',
      properties: {
        target: { type: 'string', default: 'all' },
        repeat: { type: 'integer', default: 1, minimum: 1, maximum: 5 }
      }
    },
    execute: jest.fn(execute)
  };
}

// Let queued promise callbacks run
export function flushPromises(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

// Flush promise callbacks until `condition` holds or attempts run out
export async function waitFor(condition: () => boolean, attempts = 100): Promise<void> {
  for (let i = 0; i < attempts && !condition(); i++) {
    await flushPromises();
  }
}
