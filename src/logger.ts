/**
 * Console output helpers for user-facing lines.
 *
 * Diagnostics belong in the subsystem logger; these write what the operator
 * is meant to read.
 */

import pc from 'picocolors';

export type Colors = ReturnType<typeof pc.createColors>;

export const colors: Colors = pc;

export function logError(message: string): void {
  console.error(colors.red(message));
}
