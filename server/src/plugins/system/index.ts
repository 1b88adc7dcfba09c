import * as fs from 'fs';
import * as os from 'os';
import { setTimeout as delay } from 'timers/promises';
import { CommandOutput, CommandRunner, lastLine, runCommand } from '../../utils/commandRunner';
import { ActionResult, EMPTY_SCHEMA, PluginDescriptor, stringSetting } from '../types';

// Host metrics used by the info plugins
export interface SystemProbe {
  cpuPercent(): Promise<number>;
  cpuTemperature(): Promise<number | null>;
  memory(): { total: number; free: number };
  disk(mountPoint: string): Promise<{ total: number; free: number }>;
}

export interface SystemPluginDeps {
  run: CommandRunner;
  probe: SystemProbe;
}

const CPU_SAMPLE_MS = 500;
const THERMAL_ZONE = '/sys/class/thermal/thermal_zone0/temp';

function cpuTimes(): { idle: number; total: number } {
  let idle = 0;
  let total = 0;
  for (const cpu of os.cpus()) {
    const { user, nice, sys, irq } = cpu.times;
    idle += cpu.times.idle;
    total += user + nice + sys + irq + cpu.times.idle;
  }
  return { idle, total };
}

export const hostProbe: SystemProbe = {
  async cpuPercent() {
    const before = cpuTimes();
    await delay(CPU_SAMPLE_MS);
    const after = cpuTimes();
    const total = after.total - before.total;
    if (total <= 0) return 0;
    return (1 - (after.idle - before.idle) / total) * 100;
  },

  async cpuTemperature() {
    try {
      const raw = await fs.promises.readFile(THERMAL_ZONE, 'utf-8');
      const milliDegrees = Number.parseInt(raw.trim(), 10);
      return Number.isNaN(milliDegrees) ? null : milliDegrees / 1000;
    } catch {
      // No thermal zone on this host
      return null;
    }
  },

  memory() {
    return { total: os.totalmem(), free: os.freemem() };
  },

  async disk(mountPoint) {
    const stats = await fs.promises.statfs(mountPoint);
    return { total: stats.blocks * stats.bsize, free: stats.bavail * stats.bsize };
  }
};

function usedPercent(total: number, free: number): number {
  if (total <= 0) return 0;
  return Math.round(((total - free) / total) * 100);
}

function commandResult(output: CommandOutput, successMessage: string): ActionResult {
  if (output.exitCode === 0) {
    return { success: true, message: successMessage };
  }
  const reason = lastLine(output.stderr) || lastLine(output.stdout) || `exit code ${output.exitCode}`;
  return { success: false, message: reason };
}

export function createSystemPlugins(deps: SystemPluginDeps = { run: runCommand, probe: hostProbe }): PluginDescriptor[] {
  const { run, probe } = deps;

  return [
    {
      id: 'system.shutdown',
      name: 'Shutdown',
      description: 'Shutdown the system',
      category: 'system',
      icon: 'power-off',
      configSchema: EMPTY_SCHEMA,
      async execute(context) {
        console.log('[Plugins] Executing system shutdown');
        return commandResult(await run('sudo', ['shutdown', '-h', 'now'], { signal: context.signal }), 'Shutting down');
      }
    },
    {
      id: 'system.reboot',
      name: 'Reboot',
      description: 'Reboot the system',
      category: 'system',
      icon: 'rotate-right',
      configSchema: EMPTY_SCHEMA,
      async execute(context) {
        console.log('[Plugins] Executing system reboot');
        return commandResult(await run('sudo', ['reboot'], { signal: context.signal }), 'Rebooting');
      }
    },
    {
      id: 'system.cpu_info',
      name: 'CPU Info',
      description: 'Display CPU usage and temperature',
      category: 'system',
      icon: 'microchip',
      configSchema: EMPTY_SCHEMA,
      async execute() {
        const percent = Math.round(await probe.cpuPercent());
        const temperature = await probe.cpuTemperature();
        let display = `CPU\n${percent}%`;
        if (temperature !== null) {
          display += `\n${temperature.toFixed(1)}°C`;
        }
        return { success: true, message: `CPU ${percent}%`, display };
      }
    },
    {
      id: 'system.memory_info',
      name: 'Memory Info',
      description: 'Display memory usage',
      category: 'system',
      icon: 'memory',
      configSchema: EMPTY_SCHEMA,
      async execute() {
        const { total, free } = probe.memory();
        const percent = usedPercent(total, free);
        return { success: true, message: `Memory ${percent}% used`, display: `RAM\n${percent}%` };
      }
    },
    {
      id: 'system.disk_space',
      name: 'Disk Space',
      description: 'Display disk usage',
      category: 'system',
      icon: 'hard-drive',
      configSchema: {
        type: 'object',
        properties: {
          mount_point: { type: 'string', default: '/', minLength: 1, description: 'Mount point to check' }
        }
      },
      async execute(_context, config) {
        const mountPoint = stringSetting(config, 'mount_point', '/');
        const { total, free } = await probe.disk(mountPoint);
        const percent = usedPercent(total, free);
        return { success: true, message: `Disk ${mountPoint}: ${percent}% used`, display: `Disk\n${percent}%` };
      }
    },
    {
      id: 'system.process_control',
      name: 'Process Control',
      description: 'Start, stop or restart a systemd service',
      category: 'system',
      icon: 'gears',
      configSchema: {
        type: 'object',
        properties: {
          action: { type: 'string', enum: ['start', 'stop', 'restart'], description: 'Action to perform' },
          service: { type: 'string', pattern: '^[A-Za-z0-9@._-]+$', description: 'Systemd service name' }
        },
        required: ['action', 'service']
      },
      async execute(context, config) {
        const action = stringSetting(config, 'action');
        const service = stringSetting(config, 'service');
        console.log(`[Plugins] Executing systemctl ${action} ${service}`);
        const output = await run('sudo', ['systemctl', action, service], { signal: context.signal });
        return commandResult(output, `${service}: ${action} done`);
      }
    }
  ];
}
