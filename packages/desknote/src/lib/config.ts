import { log } from '@clack/prompts';
import { readFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';

import { ALLOWED_BACKENDS, BASE_DIR, CONFIG_FILE, DEFAULT_APP_NAME } from '../util/constants';

export const backendsSchema = z.enum(ALLOWED_BACKENDS);

export type DesknoteConfig = z.infer<typeof Config.Schema>;

type LoadOptions = {
  cwd?: string;
  home?: string;
};

function getHomeDir(): string {
  return process.env.HOME ?? process.env.USERPROFILE ?? os.homedir();
}

async function loadJsonFile(filePath: string): Promise<Record<string, unknown> | undefined> {
  let input: string;

  try {
    input = await readFile(filePath, 'utf8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return undefined;
    }

    throw err;
  }

  const parsed: unknown = JSON.parse(input);

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`${filePath} must contain a JSON object`);
  }

  return Object.fromEntries(Object.entries(parsed));
}

type ConfigFile = {
  path: string;
  values: Record<string, unknown>;
};

async function loadConfigFile(filePath: string): Promise<ConfigFile | undefined> {
  const values = await loadJsonFile(filePath);

  return values ? { path: filePath, values } : undefined;
}

async function loadGlobalConfig(home: string): Promise<ConfigFile | undefined> {
  const primary = await loadConfigFile(path.join(home, BASE_DIR, CONFIG_FILE));

  if (primary) {
    return primary;
  }

  return loadConfigFile(path.join(home, '.config', 'desknote', CONFIG_FILE));
}

export namespace Config {
  let config: DesknoteConfig | undefined = undefined;
  let loadedFrom: string[] = [];

  export const Schema = z
    .object({
      $schema: z.string().optional().describe('JSON schema reference for configuration validation'),
      backend: backendsSchema
        .default('auto')
        .describe('Notification backend; auto picks one for the host OS'),
      appName: z
        .string()
        .nonempty()
        .default(DEFAULT_APP_NAME)
        .describe('Name shown by notification centers that support it'),
      notificationLimit: z
        .number()
        .int()
        .positive()
        .nullable()
        .default(null)
        .describe('Most notifications kept in the notification center (null = unlimited)'),
      logLevel: z
        .number()
        .int()
        .min(0)
        .max(5)
        .default(3)
        .describe('consola log level (0 = fatal only, 5 = trace)'),
    })
    .strict()
    .meta({
      ref: 'Config',
    });

  /**
   * Reads the global config (`~/.desknote` or `~/.config/desknote`) and the
   * project config (`./.desknote`), the latter winning key by key.
   */
  export async function load(options: LoadOptions = {}) {
    if (config) {
      return;
    }

    const cwd = options.cwd ?? process.cwd();
    const home = options.home ?? getHomeDir();

    try {
      const files = [
        await loadGlobalConfig(home),
        await loadConfigFile(path.join(cwd, BASE_DIR, CONFIG_FILE)),
      ].filter((file): file is ConfigFile => file !== undefined);

      config = parse(Object.assign({}, ...files.map((file) => file.values)));
      loadedFrom = files.map((file) => file.path);
    } catch (err) {
      if (err instanceof Error) {
        log.error(err.message);
      } else {
        log.error(String(err));
      }

      process.exit(1);
    }
  }

  export function parse(raw: unknown) {
    return Schema.parse(raw);
  }

  /** Config files that went into the loaded config, global first. Empty when only defaults apply. */
  export function sources(): readonly string[] {
    return loadedFrom;
  }

  export function all() {
    if (!config) {
      throw new Error('Config not loaded');
    }

    return config;
  }

  export function get<K extends keyof DesknoteConfig>(key: K): DesknoteConfig[K] {
    if (!config) {
      log.error('Must `.load` configuration first');
      throw new Error('Config not loaded');
    }

    return config[key];
  }
}
