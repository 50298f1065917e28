import path from 'node:path';

import { afterEach, describe, expect, it } from 'vitest';

import { getDataDirectory, getDatabasePath, resetEnvCache } from '../config.js';

describe('env config', () => {
  const originalDataDir = process.env['NETSETTLE_DATA_DIR'];

  afterEach(() => {
    if (originalDataDir === undefined) {
      delete process.env['NETSETTLE_DATA_DIR'];
    } else {
      process.env['NETSETTLE_DATA_DIR'] = originalDataDir;
    }
    resetEnvCache();
  });

  it('defaults the data directory to ./data', () => {
    delete process.env['NETSETTLE_DATA_DIR'];
    resetEnvCache();

    expect(getDataDirectory()).toBe(path.join(process.cwd(), 'data'));
  });

  it('honours NETSETTLE_DATA_DIR', () => {
    process.env['NETSETTLE_DATA_DIR'] = '/tmp/netsettle-test';
    resetEnvCache();

    expect(getDataDirectory()).toBe('/tmp/netsettle-test');
    expect(getDatabasePath()).toBe(path.join('/tmp/netsettle-test', 'settlement.db'));
  });
});
