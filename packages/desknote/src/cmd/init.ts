import { cancel, intro, isCancel, log, outro, select, text } from '@clack/prompts';
import { defineCommand } from 'citty';
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { detectBackend, type BackendChoice } from '../backends';
import { getAvailableBackends } from '../backends/util';
import { backendsSchema, Config } from '../lib/config';
import { BASE_DIR, CONFIG_FILE, DEFAULT_APP_NAME } from '../util/constants';

export function parseLimit(raw: string): number | null {
  const trimmed = raw.trim();

  if (trimmed === '' || trimmed === '0') {
    return null;
  }

  const limit = Number(trimmed);

  if (!Number.isInteger(limit) || limit < 0) {
    throw new Error(`Invalid notification limit "${raw}". Must be a positive integer.`);
  }

  return limit;
}

export const initCmd = defineCommand({
  meta: {
    name: 'init',
    description: 'Initializes desknote configuration for the current project',
  },
  args: {
    backend: {
      alias: 'b',
      required: false,
      description: 'Notification backend (auto, dbus, applescript, powershell, dummy)',
      type: 'string',
    },
    ['app-name']: {
      alias: 'n',
      required: false,
      description: 'Name shown by notification centers that support it',
      type: 'string',
    },
    limit: {
      alias: 'l',
      required: false,
      description: 'Most notifications to keep in the notification center. 0 = unlimited',
      type: 'string',
    },
    ['dry-run']: {
      default: false,
      description: "Don't save the configuration, just print out what would be saved at the end",
      type: 'boolean',
    },
  },
  async run({ args }) {
    try {
      const outDir = path.join(process.cwd(), BASE_DIR);

      intro(`Initializing desknote in ${outDir}`);

      let backend: BackendChoice;
      const requested = backendsSchema.safeParse(args.backend);

      if (requested.success) {
        backend = requested.data;
      } else {
        if (args.backend) {
          log.warn(`Unknown backend: ${args.backend}`);
        }

        const available = await getAvailableBackends();

        const choice = await select<BackendChoice>({
          message: 'Please select which backend to use:',
          options: [
            {
              value: 'auto',
              label: 'Automatic',
              hint: `Currently ${detectBackend()}`,
            },
            ...available,
          ],
        });

        if (isCancel(choice)) {
          cancel('Must provide a backend to use.');
          process.exit(0);
        }

        backend = choice;
      }

      let appName = args['app-name'];

      if (!appName) {
        const answer = await text({
          message: 'Application name shown in notifications',
          placeholder: `Leave blank to use the default (${DEFAULT_APP_NAME})`,
          defaultValue: DEFAULT_APP_NAME,
        });

        appName = isCancel(answer) ? DEFAULT_APP_NAME : answer.trim() || DEFAULT_APP_NAME;
      }

      let rawLimit = args.limit;

      if (rawLimit === undefined) {
        const answer = await text({
          message: 'How many notifications should stay in the notification center?',
          placeholder: 'Leave blank for no limit',
          defaultValue: '',
        });

        rawLimit = isCancel(answer) ? '' : answer;
      }

      const configToSave = JSON.stringify(
        Config.parse({
          backend,
          appName,
          notificationLimit: parseLimit(rawLimit),
        }),
        null,
        2,
      );

      if (args['dry-run']) {
        log.info(configToSave);
        outro('Dry run complete');
        process.exit(0);
      }

      log.step('Saving configuration');

      await mkdir(outDir, { recursive: true });
      await writeFile(path.join(outDir, CONFIG_FILE), configToSave);

      log.success('Configuration saved');

      outro('desknote initialized');
    } catch (err) {
      if (err instanceof Error) {
        log.error(err.message);
      } else {
        log.error(String(err));
      }

      process.exit(1);
    }
  },
});
