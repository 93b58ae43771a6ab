#!/usr/bin/env node
import { logError } from '../logger.js';
import { describeError } from '../monitor/errors.js';
import { main } from './program.js';

try {
  process.exitCode = await main(process.argv);
} catch (error) {
  logError(`Error: ${describeError(error)}`);
  process.exitCode = 1;
}
