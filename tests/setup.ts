/**
 * Jest setup file for test environment configuration.
 *
 * Filesystem writes start enabled in every test, and telemetry is shut down
 * after each file so no exporter outlives it.
 */

import { afterAll, beforeEach } from '@jest/globals';
import { shutdown } from '../src/telemetry/index.js';

beforeEach(() => {
  delete process.env['AGENT_FILESYSTEM_WRITES_ENABLED'];
});

afterAll(async () => {
  await shutdown();
});
