import { describe, expect, test, vi } from 'vitest';

import { logger } from '../lib/logger';
import { DEFAULT_SOUND, Notification } from '../lib/notification';
import {
  AppleScriptBackend,
  buildDisplayScript,
  escapeAppleScript,
  SYSTEM_DEFAULT_SOUND,
} from './applescript';

describe('escapeAppleScript', () => {
  test('escapes quotes, backslashes and newlines', () => {
    expect(escapeAppleScript('say "hi"\\\nbye')).toBe('say \\"hi\\"\\\\\\nbye');
  });
});

describe('buildDisplayScript', () => {
  test('shows title and message', () => {
    const script = buildDisplayScript(new Notification({ title: 'Deploy', message: 'Done' }));

    expect(script).toBe('display notification "Done" with title "Deploy"');
  });

  test('adds the sound name', () => {
    const script = buildDisplayScript(
      new Notification({ title: 'Deploy', message: 'Done', soundFile: 'Glass' }),
    );

    expect(script).toBe('display notification "Done" with title "Deploy" sound name "Glass"');
  });

  test('plays the system default sound for DEFAULT_SOUND', () => {
    const script = buildDisplayScript(
      new Notification({ title: 'Deploy', message: 'Done', soundFile: DEFAULT_SOUND }),
    );

    expect(SYSTEM_DEFAULT_SOUND).toBe('Glass');
    expect(script).toBe('display notification "Done" with title "Deploy" sound name "Glass"');
  });

  test('skips sound files it cannot play', () => {
    const warnSpy = vi.spyOn(logger, 'warn').mockImplementation(() => {});

    const script = buildDisplayScript(
      new Notification({ title: 'Deploy', message: 'Done', soundFile: '/tmp/ding.aiff' }),
    );

    expect(script).toBe('display notification "Done" with title "Deploy"');
    expect(warnSpy).toHaveBeenCalledWith('osascript can only play system sounds, ignoring /tmp/ding.aiff');
    warnSpy.mockRestore();
  });
});

describe('AppleScriptBackend', () => {
  test('runs osascript and hands out sequential identifiers', async () => {
    const run = vi.fn(async () => '');
    const backend = new AppleScriptBackend('App', run);

    const first = await backend.deliver(new Notification({ title: 'A', message: 'a' }));
    const second = await backend.deliver(new Notification({ title: 'B', message: 'b' }));

    expect(first).toBe('applescript-1');
    expect(second).toBe('applescript-2');
    expect(run).toHaveBeenNthCalledWith(1, 'osascript', [
      '-e',
      'display notification "a" with title "A"',
    ]);
  });

  test('propagates osascript failures', async () => {
    const backend = new AppleScriptBackend('App', async () => {
      throw new Error('osascript: execution error');
    });

    await expect(backend.deliver(new Notification({ title: 'A', message: 'a' }))).rejects.toThrow(
      'osascript: execution error',
    );
  });

  test('reports only display capabilities', async () => {
    const backend = new AppleScriptBackend('App', async () => '');

    expect([...(await backend.queryCapabilities())]).toEqual([
      'title',
      'message',
      'sound',
      'sound-name',
    ]);
  });
});
