import { intro, log, outro } from '@clack/prompts';
import { defineCommand } from 'citty';

import { Config } from '../lib/config';

export const configCmd = defineCommand({
  meta: {
    name: 'config',
    description: 'Display the current desknote configuration',
  },
  async run() {
    intro('desknote configuration');

    const sources = Config.sources();

    if (sources.length === 0) {
      log.warn('No configuration file found, using defaults. Run `desknote init` to create one.');
    } else {
      log.step(`Loaded from ${sources.join(', ')}`);
    }

    log.info(JSON.stringify(Config.all(), null, 2));

    outro('Done');
  },
});
