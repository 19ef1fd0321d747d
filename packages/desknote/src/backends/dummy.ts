import { logger } from '../lib/logger';
import type { Capability, Notification } from '../lib/notification';
import { createSequencer } from '../lib/sequencer';
import { NotificationBackend } from './backend';

/**
 * Fallback for hosts without a notification service: logs instead of showing.
 */
export class DummyBackend extends NotificationBackend {
  readonly name = 'dummy';
  private readonly ids = createSequencer('dummy');

  override async deliver(notification: Notification): Promise<string> {
    logger.info(`[${this.appName}] ${notification.title}: ${notification.message}`);

    return this.ids.next();
  }

  override async dismiss(): Promise<void> {}

  override async dismissAll(): Promise<void> {}

  override async queryCapabilities(): Promise<ReadonlySet<Capability>> {
    return new Set<Capability>();
  }
}
