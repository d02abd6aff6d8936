/**
 * Runtime, host and process descriptors attached to every event
 */

import os from 'node:os';
import type { EventContexts } from '../types/index.js';

export const LOOPBACK_ADDRESS = '127.0.0.1';

/**
 * Static descriptors of the running Node.js process
 */
export function createContexts(): EventContexts {
  return {
    runtime: {
      name: 'node',
      version: process.version,
    },
    system: {
      os: os.type(),
      uname: [os.type(), os.hostname(), os.release(), os.version(), os.arch()].join(' '),
    },
    process: {
      pid: process.pid,
    },
  };
}

/**
 * Resident set size of the current process in bytes
 */
export function getMemoryUsage(): number {
  return process.memoryUsage().rss;
}

/**
 * Host name of the machine
 */
export function getHostname(): string {
  return os.hostname();
}

/**
 * First external IPv4 address of the host, or the loopback address
 */
export function getIpAddress(): string {
  for (const addresses of Object.values(os.networkInterfaces())) {
    const external = addresses?.find((address) => address.family === 'IPv4' && !address.internal);
    if (external) {
      return external.address;
    }
  }
  return LOOPBACK_ADDRESS;
}

/**
 * Format a date as local ISO-8601 without offset, to the second.
 * E.g. "2024-12-21T21:54:16"
 */
export function formatTimestamp(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}
