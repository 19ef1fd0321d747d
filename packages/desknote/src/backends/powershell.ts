import { DEFAULT_SOUND, type Capability, type Notification } from '../lib/notification';
import { createSequencer } from '../lib/sequencer';
import { runCommand, type CommandRunner } from '../util/exec';
import { NotificationBackend } from './backend';

// Toasts need a registered AppUserModelID; PowerShell's own is always present.
export const POWERSHELL_APP_ID =
  '{1AC14E77-02E7-4E5D-B744-2EB1AE5198B7}\\WindowsPowerShell\\v1.0\\powershell.exe';

const DEFAULT_GROUP = 'desknote';

const LOAD_TYPES = [
  '[Windows.UI.Notifications.ToastNotificationManager, Windows.UI.Notifications, ContentType = WindowsRuntime] | Out-Null',
  '[Windows.Data.Xml.Dom.XmlDocument, Windows.Data.Xml.Dom.XmlDocument, ContentType = WindowsRuntime] | Out-Null',
];

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/** Single-quoted PowerShell literal. */
export function quotePowerShell(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function buildToastXml(notification: Notification, appName: string): string {
  const visual = [
    `<text>${escapeXml(notification.title)}</text>`,
    `<text>${escapeXml(notification.message)}</text>`,
    `<text placement="attribution">${escapeXml(appName)}</text>`,
  ];

  if (notification.icon) {
    visual.push(`<image placement="appLogoOverride" src="${escapeXml(notification.icon)}"/>`);
  }

  if (notification.attachment) {
    visual.push(`<image placement="hero" src="${escapeXml(notification.attachment)}"/>`);
  }

  let audio = '<audio silent="true"/>';

  if (notification.soundFile === DEFAULT_SOUND) {
    audio = '<audio src="ms-winsoundevent:Notification.Default"/>';
  } else if (notification.soundFile) {
    audio = `<audio src="${escapeXml(notification.soundFile)}"/>`;
  }

  const scenario = notification.urgency === 'critical' ? ' scenario="urgent"' : '';

  return [
    `<toast${scenario}>`,
    `<visual><binding template="ToastGeneric">${visual.join('')}</binding></visual>`,
    audio,
    '</toast>',
  ].join('');
}

function groupOf(notification: Notification): string {
  return notification.thread ?? DEFAULT_GROUP;
}

/**
 * Windows toasts, shown by a short PowerShell script through the WinRT
 * toast APIs. Each toast is tagged with its identifier so it can be removed
 * from the action center later. The script exits once the toast is shown, so
 * toasts the user dismisses stay tracked until they are evicted.
 */
export class PowerShellBackend extends NotificationBackend {
  readonly name = 'powershell';
  private readonly run: CommandRunner;
  private readonly ids = createSequencer('toast');

  constructor(appName: string, run: CommandRunner = runCommand) {
    super(appName);
    this.run = run;
  }

  override async deliver(notification: Notification, replaced?: Notification): Promise<string> {
    const tag = this.ids.next();
    const lines = [
      ...LOAD_TYPES,
      '$xml = New-Object Windows.Data.Xml.Dom.XmlDocument',
      `$xml.LoadXml(${quotePowerShell(buildToastXml(notification, this.appName))})`,
      '$toast = New-Object Windows.UI.Notifications.ToastNotification $xml',
      `$toast.Tag = ${quotePowerShell(tag)}`,
      `$toast.Group = ${quotePowerShell(groupOf(notification))}`,
    ];

    if (replaced?.identifier) {
      lines.push(this.removeLine(replaced));
    }

    lines.push(
      `[Windows.UI.Notifications.ToastNotificationManager]::CreateToastNotifier(${quotePowerShell(POWERSHELL_APP_ID)}).Show($toast)`,
    );

    await this.runScript(lines);

    return tag;
  }

  override async dismiss(notification: Notification): Promise<void> {
    await this.runScript([...LOAD_TYPES, this.removeLine(notification)]);
  }

  override async dismissAll(): Promise<void> {
    await this.runScript([
      ...LOAD_TYPES,
      `[Windows.UI.Notifications.ToastNotificationManager]::History.Clear(${quotePowerShell(POWERSHELL_APP_ID)})`,
    ]);
  }

  override async queryCapabilities(): Promise<ReadonlySet<Capability>> {
    return new Set<Capability>([
      'app-name',
      'title',
      'message',
      'urgency',
      'icon',
      'icon-file',
      'attachment',
      'sound',
      'sound-name',
      'thread',
    ]);
  }

  private removeLine(notification: Notification): string {
    const args = [notification.identifier, groupOf(notification), POWERSHELL_APP_ID]
      .map(quotePowerShell)
      .join(', ');

    return `[Windows.UI.Notifications.ToastNotificationManager]::History.Remove(${args})`;
  }

  private runScript(lines: string[]): Promise<string> {
    const encoded = Buffer.from(lines.join('\n'), 'utf16le').toString('base64');

    return this.run('powershell.exe', ['-NoProfile', '-NonInteractive', '-EncodedCommand', encoded]);
  }
}
