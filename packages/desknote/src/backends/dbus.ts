import { spawn } from 'node:child_process';

import { logger } from '../lib/logger';
import { DEFAULT_SOUND, type Capability, type Notification, type Urgency } from '../lib/notification';
import { runCommand, type CommandRunner } from '../util/exec';
import { Stream } from '../util/stream';
import { NotificationBackend } from './backend';

const DBUS_NAME = 'org.freedesktop.Notifications';
const DBUS_PATH = '/org/freedesktop/Notifications';

// NotificationClosed reasons defined by org.freedesktop.Notifications.
const CLOSED_BY_USER = 2;

const URGENCY_BYTES: Record<Urgency, number> = {
  low: 0,
  normal: 1,
  critical: 2,
};

const DEFAULT_ACTION = 'default';
const REPLY_ACTION = 'inline-reply';
const BUTTON_ACTION_PREFIX = 'button-';

export type SignalMonitor = { close(): void };

/**
 * Starts listening for notification signals, handing each output line to `onLine`.
 */
export type SignalMonitorFactory = (onLine: (line: string) => void) => SignalMonitor;

export type NotificationSignal =
  | { name: 'ActionInvoked'; id: number; action: string }
  | { name: 'NotificationReplied'; id: number; reply: string }
  | { name: 'NotificationClosed'; id: number; reason: number };

const SIGNAL_REGEX =
  /org\.freedesktop\.Notifications\.(ActionInvoked|NotificationReplied|NotificationClosed) \(uint32 (\d+), (.*)\)$/;

/**
 * Parses a `gdbus monitor` line for one of the signals we listen to.
 */
export function parseSignal(line: string): NotificationSignal | undefined {
  const match = line.match(SIGNAL_REGEX);

  if (!match?.[1] || !match[2] || match[3] === undefined) {
    return undefined;
  }

  const id = Number(match[2]);
  const rest = match[3];

  switch (match[1]) {
    case 'ActionInvoked':
      return { name: 'ActionInvoked', id, action: parseVariantString(rest) };
    case 'NotificationReplied':
      return { name: 'NotificationReplied', id, reply: parseVariantString(rest) };
    default: {
      const reason = rest.match(/^uint32 (\d+)$/);
      return reason?.[1] ? { name: 'NotificationClosed', id, reason: Number(reason[1]) } : undefined;
    }
  }
}

export function parseVariantString(text: string): string {
  const quote = text[0];

  if ((quote !== "'" && quote !== '"') || !text.endsWith(quote)) {
    return text;
  }

  return text.slice(1, -1).replace(/\\(.)/g, '$1');
}

export function toVariantString(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

export function toVariantArray(values: readonly string[]): string {
  return `[${values.map(toVariantString).join(', ')}]`;
}

export const spawnSignalMonitor: SignalMonitorFactory = (onLine) => {
  const child = spawn('gdbus', ['monitor', '--session', '--dest', DBUS_NAME], {
    stdio: ['ignore', 'pipe', 'ignore'],
  });

  child.on('error', (err) => {
    logger.warn(`D-Bus signal monitor failed: ${err.message}`);
  });

  Stream.toLines(child.stdout, (line) => {
    onLine(line);
  }).catch((err: unknown) => {
    logger.warn('D-Bus signal monitor stopped', err);
  });

  return {
    close() {
      child.kill();
    },
  };
};

export type DBusBackendOptions = {
  run?: CommandRunner;
  monitor?: SignalMonitorFactory;
};

/**
 * Talks to the freedesktop notification server over the session bus, using
 * the `gdbus` tool that ships with GLib.
 */
export class DBusBackend extends NotificationBackend {
  readonly name = 'dbus';
  private readonly run: CommandRunner;
  private readonly startMonitor: SignalMonitorFactory;
  private monitor: SignalMonitor | undefined;
  private serverCapabilities: Set<string> | undefined;

  constructor(appName: string, options: DBusBackendOptions = {}) {
    super(appName);
    this.run = options.run ?? runCommand;
    this.startMonitor = options.monitor ?? spawnSignalMonitor;
  }

  override async deliver(notification: Notification, replaced?: Notification): Promise<string> {
    const serverCapabilities = await this.fetchServerCapabilities();

    this.monitor ??= this.startMonitor((line) => this.handleSignal(line));

    const actions: string[] = [];

    if (notification.onClicked) {
      actions.push(DEFAULT_ACTION, '');
    }

    notification.buttons.forEach((button, index) => {
      actions.push(`${BUTTON_ACTION_PREFIX}${index}`, button.title);
    });

    if (notification.replyField) {
      if (serverCapabilities.has('inline-reply')) {
        actions.push(REPLY_ACTION, notification.replyField.buttonTitle);
      } else {
        logger.warn('Notification server does not support reply fields');
      }
    }

    const replacesId = replaced ? Number(replaced.identifier) || 0 : 0;
    const timeoutMs = notification.timeout === -1 ? -1 : notification.timeout * 1000;

    const output = await this.call('Notify', [
      toVariantString(this.appName),
      String(replacesId),
      toVariantString(notification.icon ?? ''),
      toVariantString(notification.title),
      toVariantString(notification.message),
      actions.length > 0 ? toVariantArray(actions) : '@as []',
      this.buildHints(notification),
      String(timeoutMs),
    ]);

    const match = output.match(/uint32 (\d+)/);

    if (!match?.[1]) {
      throw new Error(`Unexpected Notify reply: ${output.trim()}`);
    }

    return match[1];
  }

  override async dismiss(notification: Notification): Promise<void> {
    await this.call('CloseNotification', [notification.identifier]);
  }

  override async dismissAll(): Promise<void> {
    const failures: unknown[] = [];

    for (const notification of this.current()) {
      try {
        await this.dismiss(notification);
      } catch (err) {
        failures.push(err);
      }
    }

    if (failures.length > 0) {
      throw new AggregateError(failures, `Failed to close ${failures.length} notification(s)`);
    }
  }

  override async queryCapabilities(): Promise<ReadonlySet<Capability>> {
    const server = await this.fetchServerCapabilities();
    const capabilities = new Set<Capability>([
      'app-name',
      'title',
      'urgency',
      'icon',
      'icon-file',
      'icon-name',
      'on-dismissed',
      'timeout',
    ]);

    if (server.has('body')) {
      capabilities.add('message');
    }

    if (server.has('actions')) {
      capabilities.add('buttons');
      capabilities.add('on-clicked');
    }

    if (server.has('inline-reply')) {
      capabilities.add('reply-field');
    }

    if (server.has('body-images')) {
      capabilities.add('attachment');
    }

    if (server.has('sound')) {
      capabilities.add('sound');
      capabilities.add('sound-file');
      capabilities.add('sound-name');
    }

    return capabilities;
  }

  override async close(): Promise<void> {
    this.monitor?.close();
    this.monitor = undefined;
  }

  private handleSignal(line: string) {
    const signal = parseSignal(line);

    if (!signal) {
      return;
    }

    const notification = this.lookup(String(signal.id));

    if (!notification) {
      return;
    }

    switch (signal.name) {
      case 'ActionInvoked':
        this.handleAction(notification, signal.action);
        break;
      case 'NotificationReplied':
        this.invoke(notification.replyField?.onReplied, signal.reply);
        break;
      case 'NotificationClosed':
        if (signal.reason === CLOSED_BY_USER) {
          this.invoke(notification.onDismissed);
        }

        this.notifyDismissed(notification);
        break;
    }
  }

  private handleAction(notification: Notification, action: string) {
    if (action === DEFAULT_ACTION) {
      this.invoke(notification.onClicked);
      return;
    }

    if (action.startsWith(BUTTON_ACTION_PREFIX)) {
      const index = Number(action.slice(BUTTON_ACTION_PREFIX.length));
      this.invoke(notification.buttons[index]?.onPressed);
    }
  }

  private buildHints(notification: Notification): string {
    const hints = [`'urgency': <byte ${URGENCY_BYTES[notification.urgency]}>`];

    if (notification.soundFile === DEFAULT_SOUND) {
      hints.push(`'sound-name': <'message-new-instant'>`);
    } else if (notification.soundFile) {
      const key = isFileReference(notification.soundFile) ? 'sound-file' : 'sound-name';
      hints.push(`'${key}': <${toVariantString(stripFileScheme(notification.soundFile))}>`);
    }

    if (notification.attachment) {
      hints.push(`'image-path': <${toVariantString(notification.attachment)}>`);
    }

    if (notification.replyField) {
      hints.push(
        `'x-kde-reply-placeholder-text': <${toVariantString(notification.replyField.title)}>`,
      );
    }

    return `{${hints.join(', ')}}`;
  }

  private async fetchServerCapabilities(): Promise<Set<string>> {
    if (!this.serverCapabilities) {
      const output = await this.call('GetCapabilities', []);
      this.serverCapabilities = new Set(
        Array.from(output.matchAll(/'([^']*)'/g), (match) => match[1] ?? ''),
      );
    }

    return this.serverCapabilities;
  }

  private call(method: string, args: string[]): Promise<string> {
    return this.run('gdbus', [
      'call',
      '--session',
      '--dest',
      DBUS_NAME,
      '--object-path',
      DBUS_PATH,
      '--method',
      `${DBUS_NAME}.${method}`,
      ...args,
    ]);
  }
}

function isFileReference(value: string): boolean {
  return value.startsWith('/') || value.startsWith('file://');
}

function stripFileScheme(value: string): string {
  return value.startsWith('file://') ? value.slice('file://'.length) : value;
}
