/**
 * Host capability detection
 *
 * Decides which optional collaborators are usable on this host: required
 * utilities, the desktop notifier and the hardware sensor utility.
 */

import { MissingDependencyError } from '../errors.js';
import { commandExists } from './commands.js';

/**
 * Returns the required commands that are not installed
 */
export function findMissingCommands(required: readonly string[]): string[] {
  return required.filter(command => !commandExists(command));
}

/**
 * Throws MissingDependencyError when any required command is absent
 */
export function assertDependencies(required: readonly string[]): void {
  const missing = findMissingCommands(required);
  if (missing.length > 0) {
    throw new MissingDependencyError(missing);
  }
}

/**
 * A desktop session exists when an X11 or Wayland display is set
 */
export function hasDesktopSession(env: NodeJS.ProcessEnv = process.env): boolean {
  return Boolean(env.DISPLAY || env.WAYLAND_DISPLAY);
}

export function canSendDesktopNotifications(env: NodeJS.ProcessEnv = process.env): boolean {
  return hasDesktopSession(env) && commandExists('notify-send');
}

export function hasSensorsUtility(): boolean {
  return commandExists('sensors');
}
