import { constants } from 'node:fs';
import { access } from 'node:fs/promises';
import path from 'node:path';

/**
 * Resolves `command` against PATH, like `which`.
 */
export async function which(
  command: string,
  searchPath = process.env.PATH ?? '',
): Promise<string | undefined> {
  const extensions = process.platform === 'win32' ? ['.exe', '.cmd', ''] : [''];

  for (const dir of searchPath.split(path.delimiter)) {
    if (!dir) continue;

    for (const ext of extensions) {
      const candidate = path.join(dir, command + ext);

      try {
        await access(candidate, constants.X_OK);
        return candidate;
      } catch {
        // not here, keep looking
      }
    }
  }

  return undefined;
}
