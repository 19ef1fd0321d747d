import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

import { COMMAND_TIMEOUT_MS } from './constants';

const execFileAsync = promisify(execFile);

/**
 * Runs a program with arguments (no shell) and resolves to its stdout.
 */
export type CommandRunner = (command: string, args: readonly string[]) => Promise<string>;

export const runCommand: CommandRunner = async (command, args) => {
  const { stdout } = await execFileAsync(command, [...args], {
    encoding: 'utf8',
    timeout: COMMAND_TIMEOUT_MS,
    windowsHide: true,
  });

  return stdout;
};
