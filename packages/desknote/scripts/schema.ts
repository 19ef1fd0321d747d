import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';

import { Config } from '../src/lib/config';

const OUT_FILE = './dist/configuration_schema.json';

const result = z.toJSONSchema(Config.Schema, {
  io: 'input',
});

await mkdir(path.dirname(OUT_FILE), { recursive: true });
await writeFile(OUT_FILE, JSON.stringify(result, null, 2));
