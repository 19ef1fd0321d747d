import type { Notification, NotificationState } from './notification';

/**
 * Raised when the platform refuses to show notifications for this app.
 * Unlike delivery failures, it always reaches the caller.
 */
export class AuthorisationError extends Error {
  constructor(message = 'Not authorised to send notifications') {
    super(message);
    this.name = 'AuthorisationError';
  }
}

/**
 * A backend failed to show a notification. Logged, never thrown by the notifier.
 */
export class DeliveryError extends Error {
  readonly notification: Notification;

  constructor(notification: Notification, cause: unknown) {
    super(`Failed to deliver ${notification.describe()}: ${describeCause(cause)}`, { cause });
    this.name = 'DeliveryError';
    this.notification = notification;
  }
}

/**
 * A backend failed to remove one or all notifications. Logged, never thrown by the notifier.
 */
export class ClearError extends Error {
  readonly notification: Notification | undefined;

  constructor(notification: Notification | undefined, cause: unknown) {
    const target = notification ? notification.describe() : 'all notifications';
    super(`Failed to clear ${target}: ${describeCause(cause)}`, { cause });
    this.name = 'ClearError';
    this.notification = notification;
  }
}

export class NotificationStateError extends Error {
  readonly from: NotificationState;
  readonly to: NotificationState;

  constructor(from: NotificationState, to: NotificationState) {
    super(`Invalid notification transition: ${from} -> ${to}`);
    this.name = 'NotificationStateError';
    this.from = from;
    this.to = to;
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
