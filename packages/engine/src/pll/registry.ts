import { RP2040_CLOCK_PARAMETERS } from '../chips/rp2040/clockParameters.js';
import { createLogger } from '../util/logger.js';
import { khzToHz, parseFrequencyKhz } from './frequency.js';
import { search } from './search.js';
import type { PLLConfig } from './types.js';

const log = createLogger('registry');

// Keyed by kHz; `undefined` entries record frequencies with no configuration
const cache = new Map<number, Readonly<PLLConfig> | undefined>();

/**
 * Process-wide configuration for `khz` with the default RP2040 parameters.
 * Computed on first request; later calls return the same frozen object.
 */
export function definePllConfig(khz: number | string): Readonly<PLLConfig> | undefined {
  const key = parseFrequencyKhz(khz);
  if (cache.has(key)) return cache.get(key);

  const found = search(khzToHz(key), RP2040_CLOCK_PARAMETERS);
  const frozen = found && Object.freeze(found);
  cache.set(key, frozen);
  log.debug('computed PLL configuration', { khz: key, config: frozen ?? null });
  return frozen;
}

export function clearPllConfigCache(): void {
  cache.clear();
}
