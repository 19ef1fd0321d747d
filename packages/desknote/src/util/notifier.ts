import { createBackend } from '../backends';
import { Config } from '../lib/config';
import { DesktopNotifier } from '../lib/notifier';

export function createNotifierFromConfig(): DesktopNotifier {
  const config = Config.all();

  return new DesktopNotifier({
    appName: config.appName,
    notificationLimit: config.notificationLimit,
    backend: createBackend(config.backend, config.appName),
  });
}
