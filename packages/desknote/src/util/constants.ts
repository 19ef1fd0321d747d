export const BASE_DIR = '.desknote';
export const CONFIG_FILE = 'desknote.json';
export const DEFAULT_APP_NAME = 'App';

export const ALLOWED_BACKENDS = ['auto', 'dbus', 'applescript', 'powershell', 'dummy'] as const;

export const COMMAND_TIMEOUT_MS = 10_000;
