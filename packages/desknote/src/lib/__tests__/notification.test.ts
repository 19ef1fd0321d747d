import { afterEach, beforeEach, describe, expect, test, vi, type MockInstance } from 'vitest';
import { ZodError } from 'zod';

import { NotificationStateError } from '../errors';
import { logger } from '../logger';
import { DEFAULT_SOUND, Notification } from '../notification';

describe('Notification', () => {
  let warnSpy: MockInstance<typeof logger.warn>;

  beforeEach(() => {
    warnSpy = vi.spyOn(logger, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  describe('construction', () => {
    test('applies defaults', () => {
      const n = new Notification({ title: 'Build done', message: 'All green' });

      expect(n.urgency).toBe('normal');
      expect(n.buttons).toEqual([]);
      expect(n.timeout).toBe(-1);
      expect(n.soundFile).toBeUndefined();
      expect(n.replyField).toBeUndefined();
      expect(n.identifier).toBe('');
      expect(n.state).toBe('unsent');
    });

    test('reply field defaults its titles', () => {
      const n = new Notification({ title: 'Chat', message: 'Hi', replyField: {} });

      expect(n.replyField?.title).toBe('Reply');
      expect(n.replyField?.buttonTitle).toBe('Send');
    });

    test('keeps callbacks as given', () => {
      const onClicked = vi.fn();
      const onPressed = vi.fn();
      const onReplied = vi.fn();

      const n = new Notification({
        title: 'T',
        message: 'M',
        onClicked,
        buttons: [{ title: 'OK', onPressed }],
        replyField: { onReplied },
      });

      expect(n.onClicked).toBe(onClicked);
      expect(n.buttons[0]?.onPressed).toBe(onPressed);
      expect(n.replyField?.onReplied).toBe(onReplied);
      expect(onClicked).not.toHaveBeenCalled();
    });

    test('translates the deprecated sound flag into the default sound', () => {
      const n = new Notification({ title: 'T', message: 'M', sound: true });

      expect(n.soundFile).toBe(DEFAULT_SOUND);
      expect(warnSpy).toHaveBeenCalledTimes(1);
    });

    test('does not warn without the deprecated flag', () => {
      const n = new Notification({ title: 'T', message: 'M', soundFile: 'bell' });

      expect(n.soundFile).toBe('bell');
      expect(warnSpy).not.toHaveBeenCalled();
    });

    test('rejects sound together with soundFile', () => {
      expect(
        () => new Notification({ title: 'T', message: 'M', sound: true, soundFile: 'bell' }),
      ).toThrow(ZodError);
    });

    test('rejects a timeout below -1', () => {
      expect(() => new Notification({ title: 'T', message: 'M', timeout: -2 })).toThrow(ZodError);
    });

    test('rejects an unknown urgency', () => {
      expect(
        () => new Notification({ title: 'T', message: 'M', urgency: 'urgent' as never }),
      ).toThrow(ZodError);
    });
  });

  describe('lifecycle', () => {
    test('goes unsent, pending, delivered, cleared', () => {
      const n = new Notification({ title: 'T', message: 'M' });

      n.markPending();
      expect(n.state).toBe('pending');
      expect(n.identifier).toBe('');

      n.markDelivered('42');
      expect(n.state).toBe('delivered');
      expect(n.isDelivered).toBe(true);
      expect(n.identifier).toBe('42');

      n.markCleared();
      expect(n.state).toBe('cleared');
    });

    test('cannot be delivered without being sent', () => {
      const n = new Notification({ title: 'T', message: 'M' });

      expect(() => n.markDelivered('1')).toThrow(NotificationStateError);
    });

    test('cannot leave the failed state', () => {
      const n = new Notification({ title: 'T', message: 'M' });
      n.markPending();
      n.markFailed();

      expect(() => n.markPending()).toThrow('Invalid notification transition: failed -> pending');
    });

    test('refuses an empty identifier', () => {
      const n = new Notification({ title: 'T', message: 'M' });
      n.markPending();

      expect(() => n.markDelivered('')).toThrow(TypeError);
      expect(n.state).toBe('pending');
    });
  });

  test('describe names the title and identifier', () => {
    const n = new Notification({ title: 'T', message: 'M' });
    expect(n.describe()).toBe("Notification(title='T')");

    n.markPending();
    n.markDelivered('7');
    expect(n.describe()).toBe("Notification(title='T', identifier='7')");
  });
});
