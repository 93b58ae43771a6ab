/**
 * Temperature fallback chain
 *
 * Temperature is resolved from an ordered list of sources; the first source
 * that yields a reading wins. When none does, the result is the unavailable
 * sentinel. Resolution never throws.
 */

import { existsSync, readFileSync } from 'node:fs';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { runCommand } from '../system/commands.js';
import { hasSensorsUtility } from '../system/detection.js';
import { isNumeric } from './parsers.js';
import { TEMPERATURE_UNAVAILABLE, type Temperature } from '../types/index.js';

const log = createSubsystemLogger('monitor/temperature');

export type TemperatureSource =
  | { kind: 'thermal-zone'; path: string }
  | { kind: 'sensors-utility' };

export type TemperatureResolution =
  | { temperature: number; source: TemperatureSource['kind'] }
  | { temperature: typeof TEMPERATURE_UNAVAILABLE; source: 'none' };

/** Line labels scanned in `sensors` output */
const SENSOR_LABELS = [/^Core/, /CPU Temp/, /Package/];

export function defaultTemperatureSources(thermalZonePath: string): TemperatureSource[] {
  return [
    { kind: 'thermal-zone', path: thermalZonePath },
    { kind: 'sensors-utility' },
  ];
}

/**
 * Reads a thermal-zone file holding millidegrees Celsius
 */
export function readThermalZone(path: string): number | undefined {
  try {
    if (!existsSync(path)) {
      return undefined;
    }
    const raw = readFileSync(path, 'utf8').trim();
    if (!isNumeric(raw)) {
      log.debug('Thermal zone reading is not numeric', { path, raw });
      return undefined;
    }
    return Math.floor(Number(raw) / 1000);
  } catch (error) {
    log.debug('Failed to read thermal zone', { path, error: String(error) });
    return undefined;
  }
}

/**
 * Extracts the first positive reading from `sensors` output on a line
 * labelled Core, CPU Temp or Package
 */
export function parseSensorsOutput(output: string): number | undefined {
  for (const line of output.split('\n')) {
    if (!SENSOR_LABELS.some(label => label.test(line))) continue;

    const colon = line.indexOf(':');
    if (colon === -1) continue;

    const token = line.slice(colon + 1).trim().split(/\s+/)[0] ?? '';
    const cleaned = token.replace(/[+()]|°C/g, '');
    if (!/^\d+(\.\d+)?$/.test(cleaned)) continue;

    const value = Number(cleaned);
    if (value > 0) {
      return Math.round(value);
    }
  }
  return undefined;
}

function readSensorsUtility(): number | undefined {
  if (!hasSensorsUtility()) {
    return undefined;
  }
  const output = runCommand('sensors');
  return output === undefined ? undefined : parseSensorsOutput(output);
}

function readSource(source: TemperatureSource): number | undefined {
  switch (source.kind) {
    case 'thermal-zone':
      return readThermalZone(source.path);
    case 'sensors-utility':
      return readSensorsUtility();
  }
}

/**
 * Walks the sources in order and returns the first reading
 */
export function resolveTemperature(sources: readonly TemperatureSource[]): TemperatureResolution {
  for (const source of sources) {
    const temperature = readSource(source);
    if (temperature !== undefined) {
      return { temperature, source: source.kind };
    }
  }
  return { temperature: TEMPERATURE_UNAVAILABLE, source: 'none' };
}

export function readTemperature(thermalZonePath: string): Temperature {
  return resolveTemperature(defaultTemperatureSources(thermalZonePath)).temperature;
}
