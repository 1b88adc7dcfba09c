#!/usr/bin/env node
/**
 * keypanel CLI
 *
 * Talks to a running keypanel server over its HTTP API.
 *
 * Usage:
 *   keypanel <command> [--url <server>] [--brightness <0-100>]
 *
 * Commands:
 *   info          Show device model, layout and connectivity
 *   test          Set brightness, blank every key, then repaint the active page
 *   clear         Blank every key until the next sync
 *   discover      List keypanel servers advertised on the local network
 *
 * Examples:
 *   keypanel info
 *   keypanel test --brightness 40
 *   keypanel clear --url http://raspberrypi.local:3000
 */

import Bonjour, { Service } from 'bonjour-service';
import { setTimeout as delay } from 'timers/promises';
import { z } from 'zod';

const DEFAULT_URL = 'http://localhost:3000';
const DISCOVERY_TIMEOUT_MS = 5000;
const TEST_PAUSE_MS = 1000;

const COMMANDS = ['info', 'test', 'clear', 'discover'] as const;
type Command = typeof COMMANDS[number];

export interface CliOptions {
  command: Command;
  url: string;
  brightness: number;
}

const deviceStateSchema = z.object({
  state: z.string(),
  brightness: z.number(),
  lastError: z.string().nullable(),
  device: z
    .object({
      model: z.string(),
      serial: z.string(),
      keyCount: z.number(),
      columns: z.number(),
      rows: z.number(),
      keySize: z.number(),
      imageFormat: z.string()
    })
    .nullable()
});

function isCommand(value: string): value is Command {
  return COMMANDS.some(command => command === value);
}

// Parse command line arguments
export function parseArgs(args: string[]): CliOptions {
  let command: Command | null = null;
  let url = DEFAULT_URL;
  let brightness = 100;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (args[i] === '--url' || args[i] === '-u') {
      url = args[++i] ?? url;
    } else if (args[i] === '--brightness' || args[i] === '-b') {
      brightness = Number(args[++i]);
    } else if (isCommand(arg)) {
      command = arg;
    } else {
      throw new Error(`Unknown argument: ${args[i]}`);
    }
  }

  if (!command) {
    throw new Error(`Missing command (one of: ${COMMANDS.join(', ')})`);
  }
  if (!Number.isInteger(brightness) || brightness < 0 || brightness > 100) {
    throw new Error('Brightness must be an integer between 0 and 100');
  }
  return { command, url: url.replace(/\/+$/, ''), brightness };
}

async function request(url: string, method = 'GET', body?: unknown): Promise<unknown> {
  const response = await fetch(url, {
    method,
    headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
    body: body === undefined ? undefined : JSON.stringify(body)
  });
  const data: unknown = await response.json();
  if (!response.ok) {
    const parsed = z.object({ error: z.string() }).safeParse(data);
    throw new Error(parsed.success ? parsed.data.error : `HTTP ${response.status}`);
  }
  return data;
}

async function showInfo(url: string): Promise<void> {
  const info = deviceStateSchema.parse(await request(`${url}/api/device`));
  console.log(`State:      ${info.state}`);
  console.log(`Brightness: ${info.brightness}%`);
  if (info.device) {
    const d = info.device;
    console.log(`Model:      ${d.model} (${d.serial})`);
    console.log(`Layout:     ${d.keyCount} keys, ${d.columns}x${d.rows}, ${d.keySize}px ${d.imageFormat}`);
  }
  if (info.lastError) {
    console.log(`Last error: ${info.lastError}`);
  }
}

async function runTest(url: string, brightness: number): Promise<void> {
  console.log(`Setting brightness to ${brightness}%...`);
  await request(`${url}/api/device/brightness`, 'PUT', { brightness });
  console.log('Blanking keys...');
  await request(`${url}/api/device/clear`, 'POST');
  await delay(TEST_PAUSE_MS);
  console.log('Repainting active page...');
  await request(`${url}/api/device/reconnect`, 'POST');
  console.log('Test complete');
}

// Browse for advertised editors
async function discover(): Promise<void> {
  const bonjour = new Bonjour();
  const found = new Set<string>();
  console.log('Discovering keypanel servers via mDNS...');

  const browser = bonjour.find({ type: 'http' }, (service: Service) => {
    if (service.txt?.app !== 'keypanel') return;
    const ip = service.addresses?.find(addr => !addr.includes(':')) || service.host;
    const url = `http://${ip}:${service.port}`;
    if (found.has(url)) return;
    found.add(url);
    console.log(`  ${service.name}: ${url}`);
  });

  await delay(DISCOVERY_TIMEOUT_MS);
  browser.stop();
  bonjour.destroy();
  console.log(found.size === 0 ? 'No servers found' : `Found ${found.size} server(s)`);
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  switch (options.command) {
    case 'info':
      return showInfo(options.url);
    case 'test':
      return runTest(options.url, options.brightness);
    case 'clear':
      await request(`${options.url}/api/device/clear`, 'POST');
      console.log('Cleared all keys');
      return;
    case 'discover':
      return discover();
  }
}

if (require.main === module) {
  main().catch(error => {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  });
}
