import { afterEach, describe, expect, test, vi } from 'vitest';

describe('logger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.resetModules();
  });

  test('defaults to the info level', async () => {
    vi.stubEnv('DESKNOTE_LOG_LEVEL', '');
    const { logger } = await import('../logger');

    expect(logger.level).toBe(3);
  });

  test('takes its level from DESKNOTE_LOG_LEVEL', async () => {
    vi.stubEnv('DESKNOTE_LOG_LEVEL', '4');
    const { logger } = await import('../logger');

    expect(logger.level).toBe(4);
  });

  test('ignores a level that is not a number', async () => {
    vi.stubEnv('DESKNOTE_LOG_LEVEL', 'loud');
    const { logger } = await import('../logger');

    expect(logger.level).toBe(3);
  });
});
