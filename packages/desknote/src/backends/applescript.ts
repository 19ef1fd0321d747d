import { logger } from '../lib/logger';
import { DEFAULT_SOUND, type Capability, type Notification } from '../lib/notification';
import { createSequencer } from '../lib/sequencer';
import { runCommand, type CommandRunner } from '../util/exec';
import { NotificationBackend } from './backend';

export function escapeAppleScript(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r');
}

// Sound played for DEFAULT_SOUND, one of the names under /System/Library/Sounds.
export const SYSTEM_DEFAULT_SOUND = 'Glass';

function soundName(soundFile: string | undefined): string | undefined {
  if (!soundFile) {
    return undefined;
  }

  if (soundFile === DEFAULT_SOUND) {
    return SYSTEM_DEFAULT_SOUND;
  }

  if (soundFile.includes('/')) {
    logger.warn(`osascript can only play system sounds, ignoring ${soundFile}`);
    return undefined;
  }

  return soundFile;
}

export function buildDisplayScript(notification: Notification): string {
  const parts = [
    `display notification "${escapeAppleScript(notification.message)}"`,
    `with title "${escapeAppleScript(notification.title)}"`,
  ];

  const sound = soundName(notification.soundFile);

  if (sound) {
    parts.push(`sound name "${escapeAppleScript(sound)}"`);
  }

  return parts.join(' ');
}

/**
 * macOS notifications through `osascript`. The script bridge cannot remove
 * notifications or report interactions, so only display is supported.
 * Notifications the user closes stay tracked until they are evicted.
 */
export class AppleScriptBackend extends NotificationBackend {
  readonly name = 'applescript';
  private readonly run: CommandRunner;
  private readonly ids = createSequencer('applescript');

  constructor(appName: string, run: CommandRunner = runCommand) {
    super(appName);
    this.run = run;
  }

  override async deliver(notification: Notification): Promise<string> {
    await this.run('osascript', ['-e', buildDisplayScript(notification)]);

    return this.ids.next();
  }

  override async dismiss(notification: Notification): Promise<void> {
    logger.debug(`osascript cannot remove ${notification.describe()}`);
  }

  override async dismissAll(): Promise<void> {
    logger.debug('osascript cannot remove delivered notifications');
  }

  override async queryCapabilities(): Promise<ReadonlySet<Capability>> {
    return new Set<Capability>(['title', 'message', 'sound', 'sound-name']);
  }
}
