import { which } from '../util/which';
import type { BackendName } from '.';

type AvailableBackend = {
  label: string;
  value: BackendName;
};

const BACKEND_COMMANDS: { command: string; backend: AvailableBackend }[] = [
  { command: 'gdbus', backend: { label: 'D-Bus (gdbus)', value: 'dbus' } },
  { command: 'osascript', backend: { label: 'AppleScript (osascript)', value: 'applescript' } },
  { command: 'powershell', backend: { label: 'Windows toasts (PowerShell)', value: 'powershell' } },
];

/**
 * Backends whose helper program is on PATH. The dummy backend is always last.
 */
export const getAvailableBackends = async (searchPath?: string): Promise<AvailableBackend[]> => {
  const backends: AvailableBackend[] = [];

  for (const { command, backend } of BACKEND_COMMANDS) {
    if (await which(command, searchPath)) {
      backends.push(backend);
    }
  }

  backends.push({ label: 'Log only', value: 'dummy' });

  return backends;
};
