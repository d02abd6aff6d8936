/**
 * Fixtures for building events with predictable host facts
 *
 * @module testing/fixtures
 */

import type { HostEnvironment } from '../event/index.js';

/**
 * Host environment with fixed values
 */
export function fixedHostEnvironment(overrides: Partial<HostEnvironment> = {}): HostEnvironment {
  return {
    contexts: () => ({
      runtime: { name: 'node', version: 'v20.0.0' },
      system: { os: 'Linux', uname: 'Linux test-host 6.0.0 #1 SMP x64' },
      process: { pid: 4242 },
    }),
    hostname: () => 'test-host',
    ipAddress: () => '10.0.0.5',
    memoryUsage: () => 52428800,
    now: () => new Date(2024, 11, 21, 21, 54, 16),
    ...overrides,
  };
}
