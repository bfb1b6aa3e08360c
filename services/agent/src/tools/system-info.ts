import os from 'node:os';
import { z } from 'zod';
import { defineTool } from '@tessera/engine';
import type { ToolSpec } from '@tessera/engine';

export function formatBytes(bytes: number): string {
  const units = ['B', 'KiB', 'MiB', 'GiB', 'TiB'];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${value.toFixed(unit === 0 ? 0 : 1)} ${units[unit]}`;
}

export function formatUptime(seconds: number): string {
  const days = Math.floor(seconds / 86_400);
  const hours = Math.floor((seconds % 86_400) / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  return `${days}d ${hours}h ${minutes}m`;
}

export function describeSystem(): string {
  const [load1, load5, load15] = os.loadavg();
  const total = os.totalmem();
  const free = os.freemem();
  return [
    `hostname: ${os.hostname()}`,
    `platform: ${os.platform()} ${os.release()} (${os.arch()})`,
    `uptime: ${formatUptime(os.uptime())}`,
    `cpus: ${os.cpus().length}`,
    `load: ${load1.toFixed(2)} ${load5.toFixed(2)} ${load15.toFixed(2)}`,
    `memory: ${formatBytes(total - free)} used of ${formatBytes(total)}`,
  ].join('\n');
}

export function createSystemInfoTools(): ToolSpec[] {
  return [
    defineTool({
      name: 'system_info',
      description: 'Report the host name, platform, uptime, load averages and memory use.',
      schema: z.object({}),
      sensitivity: 'normal',
      handler: () => describeSystem(),
    }),
  ];
}
