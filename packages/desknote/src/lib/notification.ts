import { z } from 'zod';

import { NotificationStateError } from './errors';
import { logger } from './logger';

/** Sound token asking the platform for its default notification sound. */
export const DEFAULT_SOUND = 'default';

export const URGENCIES = ['critical', 'normal', 'low'] as const;

export type Urgency = (typeof URGENCIES)[number];

/**
 * Every optional feature a backend may or may not support. Callers check
 * `DesktopNotifier.getCapabilities()` and degrade on their own.
 */
export const CAPABILITIES = [
  'app-name',
  'title',
  'message',
  'urgency',
  'icon',
  'icon-file',
  'icon-name',
  'buttons',
  'reply-field',
  'attachment',
  'on-clicked',
  'on-dismissed',
  'sound',
  'sound-file',
  'sound-name',
  'thread',
  'timeout',
] as const;

export type Capability = (typeof CAPABILITIES)[number];

export type NotificationState = 'unsent' | 'pending' | 'delivered' | 'failed' | 'cleared';

const TRANSITIONS: Record<NotificationState, readonly NotificationState[]> = {
  unsent: ['pending'],
  pending: ['delivered', 'failed'],
  delivered: ['cleared'],
  failed: [],
  cleared: [],
};

const callbackSchema = z.custom<() => unknown>(
  (value) => typeof value === 'function',
  'Expected a callback function',
);

const replyCallbackSchema = z.custom<(reply: string) => unknown>(
  (value) => typeof value === 'function',
  'Expected a callback function',
);

const buttonSchema = z.object({
  title: z.string(),
  onPressed: callbackSchema.optional(),
});

const replyFieldSchema = z.object({
  title: z.string().default('Reply'),
  buttonTitle: z.string().default('Send'),
  onReplied: replyCallbackSchema.optional(),
});

const notificationSchema = z
  .object({
    title: z.string(),
    message: z.string(),
    urgency: z.enum(URGENCIES).default('normal'),
    icon: z.string().nonempty().optional(),
    buttons: z.array(buttonSchema).default([]),
    replyField: replyFieldSchema.optional(),
    onClicked: callbackSchema.optional(),
    onDismissed: callbackSchema.optional(),
    attachment: z.string().nonempty().optional(),
    /** @deprecated use `soundFile: DEFAULT_SOUND` */
    sound: z.boolean().default(false),
    soundFile: z.string().nonempty().optional(),
    thread: z.string().nonempty().optional(),
    timeout: z.number().int().min(-1).default(-1),
  })
  .refine((value) => !(value.sound && value.soundFile !== undefined), {
    message: '`sound` and `soundFile` are mutually exclusive',
    path: ['sound'],
  });

export type NotificationInit = z.input<typeof notificationSchema>;
export type Button = z.output<typeof buttonSchema>;
export type ReplyField = z.output<typeof replyFieldSchema>;

/**
 * A desktop notification. Callbacks are held for the backend, which invokes
 * them on the matching OS event; the notifier never calls them.
 *
 * The identifier stays empty until a backend has delivered the notification.
 */
export class Notification {
  readonly title: string;
  readonly message: string;
  readonly urgency: Urgency;
  readonly icon: string | undefined;
  readonly buttons: readonly Button[];
  readonly replyField: ReplyField | undefined;
  readonly onClicked: (() => unknown) | undefined;
  readonly onDismissed: (() => unknown) | undefined;
  readonly attachment: string | undefined;
  readonly soundFile: string | undefined;
  readonly thread: string | undefined;
  /** Seconds, -1 for the platform default. */
  readonly timeout: number;

  private _identifier = '';
  private _state: NotificationState = 'unsent';

  constructor(init: NotificationInit) {
    const parsed = notificationSchema.parse(init);

    if (parsed.sound) {
      logger.warn('`sound: true` is deprecated, use `soundFile: DEFAULT_SOUND` instead');
    }

    this.title = parsed.title;
    this.message = parsed.message;
    this.urgency = parsed.urgency;
    this.icon = parsed.icon;
    this.buttons = parsed.buttons;
    this.replyField = parsed.replyField;
    this.onClicked = parsed.onClicked;
    this.onDismissed = parsed.onDismissed;
    this.attachment = parsed.attachment;
    this.soundFile = parsed.sound ? DEFAULT_SOUND : parsed.soundFile;
    this.thread = parsed.thread;
    this.timeout = parsed.timeout;
  }

  get identifier(): string {
    return this._identifier;
  }

  get state(): NotificationState {
    return this._state;
  }

  get isDelivered(): boolean {
    return this._state === 'delivered';
  }

  markPending(): void {
    this.transition('pending');
  }

  markDelivered(identifier: string): void {
    if (identifier === '') {
      throw new TypeError('A delivered notification needs a non-empty identifier');
    }

    this.transition('delivered');
    this._identifier = identifier;
  }

  markFailed(): void {
    this.transition('failed');
  }

  markCleared(): void {
    this.transition('cleared');
  }

  describe(): string {
    const id = this._identifier ? `, identifier='${this._identifier}'` : '';

    return `Notification(title='${this.title}'${id})`;
  }

  private transition(next: NotificationState) {
    if (!TRANSITIONS[this._state].includes(next)) {
      throw new NotificationStateError(this._state, next);
    }

    this._state = next;
  }
}
