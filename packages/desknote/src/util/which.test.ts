import { chmod, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterAll, beforeAll, describe, expect, test } from 'vitest';

import { which } from './which';

describe.skipIf(process.platform === 'win32')('which', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'desknote-which-'));
    await writeFile(path.join(dir, 'notify-tool'), '#!/bin/sh\n');
    await chmod(path.join(dir, 'notify-tool'), 0o755);
    await writeFile(path.join(dir, 'plain-file'), 'data');
    await chmod(path.join(dir, 'plain-file'), 0o644);
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test('finds executables on the search path', async () => {
    expect(await which('notify-tool', dir)).toBe(path.join(dir, 'notify-tool'));
  });

  test('ignores missing commands', async () => {
    expect(await which('missing-tool', dir)).toBeUndefined();
  });

  test('ignores files without the execute bit', async () => {
    expect(await which('plain-file', dir)).toBeUndefined();
  });

  test('skips empty path entries', async () => {
    expect(await which('notify-tool', `${path.delimiter}${dir}`)).toBe(
      path.join(dir, 'notify-tool'),
    );
  });
});
