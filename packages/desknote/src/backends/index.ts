import type { ALLOWED_BACKENDS } from '../util/constants';
import { AppleScriptBackend } from './applescript';
import type { NotificationBackend } from './backend';
import { DBusBackend } from './dbus';
import { DummyBackend } from './dummy';
import { PowerShellBackend } from './powershell';

export type BackendChoice = (typeof ALLOWED_BACKENDS)[number];
export type BackendName = Exclude<BackendChoice, 'auto'>;

/**
 * Picks the backend for a host OS, as reported by `process.platform`.
 */
export function detectBackend(platform: NodeJS.Platform = process.platform): BackendName {
  switch (platform) {
    case 'linux':
    case 'freebsd':
    case 'openbsd':
      return 'dbus';
    case 'darwin':
      return 'applescript';
    case 'win32':
      return 'powershell';
    default:
      return 'dummy';
  }
}

export function createBackend(choice: BackendChoice, appName: string): NotificationBackend {
  const name = choice === 'auto' ? detectBackend() : choice;

  switch (name) {
    case 'dbus':
      return new DBusBackend(appName);
    case 'applescript':
      return new AppleScriptBackend(appName);
    case 'powershell':
      return new PowerShellBackend(appName);
    case 'dummy':
      return new DummyBackend(appName);
  }
}
