import type { NotificationBackend } from '../backends/backend';
import { createBackend } from '../backends';
import { DEFAULT_APP_NAME } from '../util/constants';
import { NotificationCache } from './cache';
import { AuthorisationError, ClearError, DeliveryError } from './errors';
import { logger } from './logger';
import type { Capability, Notification } from './notification';
import { createSerialQueue } from './queue';

export type NotifierOptions = {
  /** Name shown by notification centers that support it. */
  appName?: string;
  /** Most notifications kept in the notification center; null for no limit. */
  notificationLimit?: number | null;
  /** Defaults to the backend for the current platform. */
  backend?: NotificationBackend;
};

/**
 * Platform-independent front for desktop notifications.
 *
 * Sending and clearing are best-effort: backend failures are logged and the
 * tracked notifications are kept consistent, but nothing is thrown at the
 * caller except {@link AuthorisationError}.
 */
export class DesktopNotifier {
  readonly appName: string;
  readonly notificationLimit: number | null;
  private readonly backend: NotificationBackend;
  private readonly cache: NotificationCache;
  private readonly queue = createSerialQueue();

  constructor(options: NotifierOptions = {}) {
    this.appName = options.appName ?? DEFAULT_APP_NAME;
    this.notificationLimit = options.notificationLimit ?? null;
    this.cache = new NotificationCache(this.notificationLimit);
    this.backend = options.backend ?? createBackend('auto', this.appName);

    this.backend.attach({
      lookup: (identifier) => this.cache.lookup(identifier),
      current: () => this.cache.snapshot(),
      dismissed: (notification) => this.handleDismissed(notification),
    });
  }

  get backendName(): string {
    return this.backend.name;
  }

  /** Notifications currently in the notification center, oldest first. */
  get currentNotifications(): Notification[] {
    return this.cache.snapshot();
  }

  send(notification: Notification): Promise<void> {
    return this.queue.run(() => this.deliver(notification));
  }

  clear(notification: Notification): Promise<void> {
    return this.queue.run(async () => {
      let failure: unknown;

      // An evicted entry may share its OS id with the notification that replaced it.
      if (notification.isDelivered) {
        try {
          await this.backend.dismiss(notification);
        } catch (err) {
          failure = err;
        }
      } else {
        logger.debug(`Skipping clear of ${notification.state} ${notification.describe()}`);
      }

      this.cache.forget(notification);

      if (notification.isDelivered) {
        notification.markCleared();
      }

      if (failure !== undefined) {
        this.report(failure, new ClearError(notification, failure));
      }
    });
  }

  clearAll(): Promise<void> {
    return this.queue.run(async () => {
      let failure: unknown;

      try {
        await this.backend.dismissAll();
      } catch (err) {
        failure = err;
      }

      for (const notification of this.cache.snapshot()) {
        if (notification.isDelivered) {
          notification.markCleared();
        }
      }

      this.cache.clear();

      if (failure !== undefined) {
        this.report(failure, new ClearError(undefined, failure));
      }
    });
  }

  requestAuthorisation(): Promise<boolean> {
    return this.backend.requestAuthorisation();
  }

  hasAuthorisation(): Promise<boolean> {
    return this.backend.queryAuthorisation();
  }

  getCapabilities(): Promise<ReadonlySet<Capability>> {
    return this.backend.queryCapabilities();
  }

  /** Releases backend resources such as OS signal listeners. */
  close(): Promise<void> {
    return this.queue.run(() => this.backend.close());
  }

  private async deliver(notification: Notification) {
    notification.markPending();

    const replaced = this.cache.evictOldest();

    try {
      const identifier = await this.backend.deliver(notification, replaced);

      if (!identifier) {
        throw new Error(`Backend ${this.backend.name} returned no identifier`);
      }

      notification.markDelivered(identifier);
    } catch (err) {
      notification.markFailed();

      // The OS may have closed the evicted entry while we were waiting.
      if (replaced?.isDelivered) {
        this.cache.restore(replaced);
      }

      this.report(err, new DeliveryError(notification, err));
      return;
    }

    if (replaced?.isDelivered) {
      replaced.markCleared();
    }

    this.cache.record(notification);
  }

  private handleDismissed(notification: Notification) {
    this.cache.forget(notification);

    if (notification.isDelivered) {
      notification.markCleared();
    }
  }

  private report(cause: unknown, wrapped: Error) {
    if (cause instanceof AuthorisationError) {
      throw cause;
    }

    logger.warn(wrapped);
  }
}
