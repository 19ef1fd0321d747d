import { describe, expect, test } from 'vitest';

import { AppleScriptBackend } from './applescript';
import { DBusBackend } from './dbus';
import { DummyBackend } from './dummy';
import { createBackend, detectBackend } from '.';
import { PowerShellBackend } from './powershell';

describe('detectBackend', () => {
  test('maps host platforms to backends', () => {
    expect(detectBackend('linux')).toBe('dbus');
    expect(detectBackend('freebsd')).toBe('dbus');
    expect(detectBackend('darwin')).toBe('applescript');
    expect(detectBackend('win32')).toBe('powershell');
    expect(detectBackend('aix')).toBe('dummy');
  });
});

describe('createBackend', () => {
  test('builds the named backend with the app name', () => {
    const backend = createBackend('dbus', 'Builder');

    expect(backend).toBeInstanceOf(DBusBackend);
    expect(backend.appName).toBe('Builder');
    expect(createBackend('applescript', 'A')).toBeInstanceOf(AppleScriptBackend);
    expect(createBackend('powershell', 'A')).toBeInstanceOf(PowerShellBackend);
    expect(createBackend('dummy', 'A')).toBeInstanceOf(DummyBackend);
  });

  test('auto resolves to the backend for this host', () => {
    expect(createBackend('auto', 'A').name).toBe(detectBackend());
  });
});
