import { logger } from '../lib/logger';
import type { Capability, Notification } from '../lib/notification';

/**
 * What the notifier hands a backend so it can map OS events back to
 * notifications and report the ones the OS closed on its own.
 */
export type BackendHooks = {
  lookup(identifier: string): Notification | undefined;
  current(): Notification[];
  dismissed(notification: Notification): void;
};

/**
 * One implementation per platform. `deliver` must reject when the
 * notification could not be shown; partial degradation (a missing icon, an
 * unsupported field) is logged as a warning instead.
 */
export abstract class NotificationBackend {
  abstract readonly name: string;
  readonly appName: string;
  private hooks: BackendHooks | undefined;

  constructor(appName: string) {
    this.appName = appName;
  }

  attach(hooks: BackendHooks): void {
    this.hooks = hooks;
  }

  /**
   * Shows `notification`, reusing the OS slot of `replaced` where the platform
   * allows it. Resolves to the platform identifier.
   */
  abstract deliver(notification: Notification, replaced?: Notification): Promise<string>;
  abstract dismiss(notification: Notification): Promise<void>;
  abstract dismissAll(): Promise<void>;
  abstract queryCapabilities(): Promise<ReadonlySet<Capability>>;

  async queryAuthorisation(): Promise<boolean> {
    return true;
  }

  async requestAuthorisation(): Promise<boolean> {
    return this.queryAuthorisation();
  }

  async close(): Promise<void> {}

  protected lookup(identifier: string): Notification | undefined {
    return this.hooks?.lookup(identifier);
  }

  protected current(): Notification[] {
    return this.hooks?.current() ?? [];
  }

  protected notifyDismissed(notification: Notification): void {
    this.hooks?.dismissed(notification);
  }

  protected invoke<A extends unknown[]>(
    callback: ((...args: A) => unknown) | undefined,
    ...args: A
  ): void {
    if (!callback) {
      return;
    }

    try {
      const result = callback(...args);

      if (result instanceof Promise) {
        result.catch((err: unknown) => {
          logger.error('Notification callback failed', err);
        });
      }
    } catch (err) {
      logger.error('Notification callback failed', err);
    }
  }
}
