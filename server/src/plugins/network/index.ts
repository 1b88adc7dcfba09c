import * as os from 'os';
import { CommandRunner, lastLine, runCommand } from '../../utils/commandRunner';
import { PluginDescriptor, numberSetting, stringSetting } from '../types';

export interface NetworkPluginDeps {
  run: CommandRunner;
  interfaces: () => NodeJS.Dict<os.NetworkInterfaceInfo[]>;
}

// "rtt min/avg/max/mdev = 0.045/0.052/0.061/0.007 ms"
const PING_SUMMARY = /=\s*[\d.]+\/([\d.]+)\/[\d.]+/;

// Average round trip from ping output, in milliseconds
export function parsePingAverage(output: string): number | null {
  const match = PING_SUMMARY.exec(output);
  return match ? Number.parseFloat(match[1]) : null;
}

// Whether `ip link show` reports the interface as administratively up
export function isLinkUp(output: string): boolean {
  const flags = /<([^>]*)>/.exec(output);
  return flags ? flags[1].split(',').includes('UP') : false;
}

export function createNetworkPlugins(
  deps: NetworkPluginDeps = { run: runCommand, interfaces: os.networkInterfaces }
): PluginDescriptor[] {
  const { run, interfaces } = deps;

  return [
    {
      id: 'network.show_ip',
      name: 'Show IP Address',
      description: 'Display the current IP address',
      category: 'network',
      icon: 'network-wired',
      configSchema: {
        type: 'object',
        properties: {
          interface: { type: 'string', default: 'eth0', minLength: 1, description: 'Network interface' }
        }
      },
      async execute(_context, config) {
        const name = stringSetting(config, 'interface', 'eth0');
        const address = (interfaces()[name] ?? []).find(info => info.family === 'IPv4');
        if (!address) {
          return { success: false, message: `No IPv4 address on ${name}`, display: `${name}\nno IP` };
        }
        console.log(`[Plugins] IP address (${name}): ${address.address}`);
        return { success: true, message: address.address, display: address.address };
      }
    },
    {
      id: 'network.ping',
      name: 'Ping Host',
      description: 'Ping a host and display the average round trip',
      category: 'network',
      icon: 'paper-plane',
      configSchema: {
        type: 'object',
        properties: {
          host: { type: 'string', default: '8.8.8.8', pattern: '^[A-Za-z0-9.:-]+$', description: 'Host to ping' },
          count: { type: 'integer', default: 3, minimum: 1, maximum: 20, description: 'Number of pings' }
        },
        required: ['host']
      },
      async execute(context, config) {
        const host = stringSetting(config, 'host', '8.8.8.8');
        const count = numberSetting(config, 'count', 3);
        console.log(`[Plugins] Pinging ${host}...`);

        const output = await run('ping', ['-c', String(count), host], { timeoutMs: 10000, signal: context.signal });
        if (output.exitCode !== 0) {
          return { success: false, message: `${host} unreachable`, display: `${host}\nDOWN` };
        }
        const average = parsePingAverage(output.stdout);
        if (average === null) {
          return { success: true, message: `${host} reachable`, display: `${host}\nUP` };
        }
        return { success: true, message: `${host}: ${average} ms`, display: `${Math.round(average)} ms` };
      }
    },
    {
      id: 'network.toggle_wifi',
      name: 'Toggle WiFi',
      description: 'Turn WiFi on or off',
      category: 'network',
      icon: 'wifi',
      configSchema: {
        type: 'object',
        properties: {
          interface: { type: 'string', default: 'wlan0', pattern: '^[A-Za-z0-9_.-]+$', description: 'WiFi interface name' }
        }
      },
      async execute(context, config) {
        const name = stringSetting(config, 'interface', 'wlan0');
        const status = await run('ip', ['link', 'show', name], { signal: context.signal });
        if (status.exitCode !== 0) {
          return { success: false, message: lastLine(status.stderr) || `Unknown interface ${name}` };
        }

        const target = isLinkUp(status.stdout) ? 'down' : 'up';
        console.log(`[Plugins] Setting WiFi (${name}) ${target}`);
        const output = await run('sudo', ['ip', 'link', 'set', name, target], { signal: context.signal });
        if (output.exitCode !== 0) {
          return { success: false, message: lastLine(output.stderr) || `exit code ${output.exitCode}` };
        }
        return { success: true, message: `${name} ${target}`, display: `WiFi\n${target === 'up' ? 'ON' : 'OFF'}` };
      }
    }
  ];
}
