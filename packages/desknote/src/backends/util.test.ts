import { chmod, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterAll, beforeAll, describe, expect, test } from 'vitest';

import { getAvailableBackends } from './util';

describe.skipIf(process.platform === 'win32')('getAvailableBackends', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'desknote-backends-'));
    await writeFile(path.join(dir, 'gdbus'), '#!/bin/sh\n');
    await chmod(path.join(dir, 'gdbus'), 0o755);
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test('lists backends whose helper is installed, then the log-only fallback', async () => {
    expect(await getAvailableBackends(dir)).toEqual([
      { label: 'D-Bus (gdbus)', value: 'dbus' },
      { label: 'Log only', value: 'dummy' },
    ]);
  });

  test('falls back to logging when nothing is installed', async () => {
    expect(await getAvailableBackends('')).toEqual([{ label: 'Log only', value: 'dummy' }]);
  });
});
