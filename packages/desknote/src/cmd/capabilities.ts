import { intro, log, outro } from '@clack/prompts';
import { defineCommand } from 'citty';

import { CAPABILITIES } from '../lib/notification';
import { createNotifierFromConfig } from '../util/notifier';

export const capabilitiesCmd = defineCommand({
  meta: {
    name: 'capabilities',
    description: 'List the notification features the current backend supports',
  },
  async run() {
    const notifier = createNotifierFromConfig();

    intro(`Capabilities of the ${notifier.backendName} backend`);

    try {
      const supported = await notifier.getCapabilities();

      for (const capability of CAPABILITIES) {
        log.message(`${supported.has(capability) ? '✔' : '✖'} ${capability}`);
      }
    } catch (err) {
      log.error(err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
    } finally {
      await notifier.close();
    }

    outro('Done');
  },
});
