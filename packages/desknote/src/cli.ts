#!/usr/bin/env -S npx tsx
import { defineCommand, runMain } from 'citty';

import pkg from '../package.json';
import { Config } from './lib/config';
import { logger } from './lib/logger';

const desknote = defineCommand({
  meta: {
    name: 'desknote',
    description: 'Send desktop notifications from the command line',
    version: pkg.version,
  },
  async setup() {
    await Config.load();

    if (!process.env.DESKNOTE_LOG_LEVEL) {
      logger.level = Config.get('logLevel');
    }
  },
  subCommands: {
    capabilities: () => import('./cmd/capabilities').then((m) => m.capabilitiesCmd),
    config: () => import('./cmd/config').then((m) => m.configCmd),
    init: () => import('./cmd/init').then((m) => m.initCmd),
    send: () => import('./cmd/send').then((m) => m.sendCmd),
  },
});

runMain(desknote);
