export { NotificationBackend, type BackendHooks } from './backends/backend';
export { AppleScriptBackend } from './backends/applescript';
export { DBusBackend, type DBusBackendOptions, type SignalMonitorFactory } from './backends/dbus';
export { DummyBackend } from './backends/dummy';
export { PowerShellBackend } from './backends/powershell';
export { createBackend, detectBackend, type BackendChoice, type BackendName } from './backends';
export { NotificationCache } from './lib/cache';
export {
  AuthorisationError,
  ClearError,
  DeliveryError,
  NotificationStateError,
} from './lib/errors';
export { logger } from './lib/logger';
export {
  CAPABILITIES,
  DEFAULT_SOUND,
  Notification,
  URGENCIES,
  type Button,
  type Capability,
  type NotificationInit,
  type NotificationState,
  type ReplyField,
  type Urgency,
} from './lib/notification';
export { DesktopNotifier, type NotifierOptions } from './lib/notifier';
export type { CommandRunner } from './util/exec';
