/**
 * OS command helpers
 *
 * Thin wrappers over child_process used by every reader that shells out to a
 * system utility. A failed command yields `undefined` instead of throwing.
 */

import { execSync } from 'node:child_process';
import { createSubsystemLogger } from '../../logging/subsystem.js';

const log = createSubsystemLogger('monitor/commands');

/**
 * Runs a shell command and returns its stdout, or undefined when it fails
 */
export function runCommand(command: string): string | undefined {
  try {
    return execSync(command, {
      encoding: 'utf8',
      stdio: ['ignore', 'pipe', 'ignore'],
      env: { ...process.env, LC_ALL: 'C' },
    });
  } catch (error) {
    log.debug('Command failed', { command, error: String(error) });
    return undefined;
  }
}

/**
 * Checks whether an executable is on PATH
 */
export function commandExists(name: string): boolean {
  if (!/^[\w.-]+$/.test(name)) {
    return false;
  }
  try {
    execSync(`command -v ${name}`, { stdio: 'ignore' });
    return true;
  } catch {
    return false;
  }
}

/**
 * Quotes a value for safe use as a single shell word
 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}
