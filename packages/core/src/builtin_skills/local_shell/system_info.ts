import * as os from 'os';
import type { JsonObject } from '../../types';

/**
 * Host snapshot from node:os.
 */
export function collectSystemInfo(): JsonObject {
  const cpus = os.cpus();
  const total = os.totalmem();
  const free = os.freemem();
  const used = total - free;

  return {
    platform: {
      system: os.type(),
      platform: process.platform,
      release: os.release(),
      version: os.version(),
      machine: os.machine(),
      hostname: os.hostname(),
      nodeVersion: process.version,
    },
    cpu: {
      logicalCores: cpus.length,
      model: cpus[0]?.model ?? null,
      loadAverage: os.loadavg(),
    },
    memory: {
      total,
      free,
      used,
      percent: total > 0 ? Math.round((used / total) * 1000) / 10 : 0,
    },
    uptimeSeconds: Math.floor(os.uptime()),
    bootTime: new Date(Date.now() - os.uptime() * 1000).toISOString(),
    networkInterfaces: Object.keys(os.networkInterfaces()),
  };
}
