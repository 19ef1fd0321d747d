import { log } from '@clack/prompts';
import { defineCommand } from 'citty';
import { ZodError, z } from 'zod';

import { AuthorisationError } from '../lib/errors';
import {
  DEFAULT_SOUND,
  Notification,
  URGENCIES,
  type NotificationInit,
} from '../lib/notification';
import { createNotifierFromConfig } from '../util/notifier';

const urgencySchema = z.enum(URGENCIES);

export function parseButtons(raw: string | undefined): NotificationInit['buttons'] {
  if (!raw) {
    return [];
  }

  return raw
    .split(',')
    .map((title) => title.trim())
    .filter((title) => title !== '')
    .map((title) => ({ title }));
}

export function parseTimeout(raw: string | undefined): number {
  if (raw === undefined) {
    return -1;
  }

  const timeout = Number(raw);

  if (!Number.isInteger(timeout) || timeout < -1) {
    throw new Error(`Invalid --timeout value "${raw}". Must be an integer of seconds, or -1.`);
  }

  return timeout;
}

export const sendCmd = defineCommand({
  meta: {
    name: 'send',
    description: 'Send a desktop notification',
  },
  args: {
    title: {
      type: 'positional',
      description: 'Notification title',
      required: true,
    },
    message: {
      type: 'positional',
      description: 'Notification body',
      required: true,
    },
    urgency: {
      alias: 'u',
      description: `Urgency (${URGENCIES.join(', ')})`,
      type: 'string',
      default: 'normal',
    },
    icon: {
      alias: 'i',
      description: 'Icon URI or icon name',
      type: 'string',
      required: false,
    },
    sound: {
      alias: 's',
      description: 'Play the platform default sound',
      type: 'boolean',
      default: false,
    },
    ['sound-file']: {
      description: 'Sound name or file to play instead of the default sound',
      type: 'string',
      required: false,
    },
    timeout: {
      alias: 't',
      description: 'Seconds to show the notification for (-1 = platform default)',
      type: 'string',
      required: false,
    },
    thread: {
      description: 'Group related notifications under this key',
      type: 'string',
      required: false,
    },
    attachment: {
      alias: 'a',
      description: 'URI of an image to attach',
      type: 'string',
      required: false,
    },
    buttons: {
      alias: 'b',
      description: 'Comma separated button titles',
      type: 'string',
      required: false,
    },
  },
  async run({ args }) {
    let notification: Notification;

    try {
      notification = new Notification({
        title: args.title,
        message: args.message,
        urgency: urgencySchema.parse(args.urgency),
        icon: args.icon,
        soundFile: args.sound ? DEFAULT_SOUND : args['sound-file'],
        timeout: parseTimeout(args.timeout),
        thread: args.thread,
        attachment: args.attachment,
        buttons: parseButtons(args.buttons),
      });
    } catch (err) {
      if (err instanceof ZodError) {
        for (const issue of err.issues) {
          log.error(`${issue.path.join('.') || 'input'}: ${issue.message}`);
        }
      } else {
        log.error(err instanceof Error ? err.message : String(err));
      }

      process.exit(1);
    }

    const notifier = createNotifierFromConfig();

    try {
      await notifier.send(notification);
    } catch (err) {
      if (err instanceof AuthorisationError) {
        log.error(`${err.message}. Allow notifications for this terminal and try again.`);
        process.exitCode = 1;
        return;
      }

      throw err;
    } finally {
      await notifier.close();
    }

    if (notification.isDelivered) {
      log.success(`Notification sent (${notifier.backendName} id ${notification.identifier})`);
    } else {
      log.warn('Notification could not be delivered; run with DESKNOTE_LOG_LEVEL=4 for details');
      process.exitCode = 1;
    }
  },
});
