/*
 * Kilohertz input boundary: callers request frequencies as integer kHz
 * literals, the search works in Hz.
 */
import { RP2040_CLOCK_PARAMETERS } from '../chips/rp2040/clockParameters.js';
import { search } from './search.js';
import type { ClockParameters, PLLConfig, SearchOptions } from './types.js';

export class FrequencyInputError extends Error {
  readonly input: unknown;

  constructor(message: string, input: unknown) {
    super(message);
    this.name = 'FrequencyInputError';
    this.input = input;
  }
}

// Digits with optional `_` group separators, e.g. 480_000
const KHZ_LITERAL_RE = /^\d+(?:_\d+)*$/;

/**
 * Parse a kHz frequency literal. Accepts a number or a decimal string and
 * returns a positive safe integer.
 */
export function parseFrequencyKhz(value: number | string): number {
  let khz: number;
  if (typeof value === 'string') {
    const text = value.trim();
    if (!KHZ_LITERAL_RE.test(text)) {
      throw new FrequencyInputError(`Frequency '${value}' is not an integer number of kHz`, value);
    }
    khz = Number(text.replace(/_/g, ''));
  } else {
    khz = value;
  }

  if (!Number.isSafeInteger(khz)) {
    throw new FrequencyInputError(`Frequency ${value} kHz is not a whole number`, value);
  }
  if (khz <= 0) {
    throw new FrequencyInputError(`Frequency must be positive (got ${khz} kHz)`, value);
  }
  return khz;
}

export function khzToHz(khz: number): number {
  return khz * 1000;
}

/**
 * Divider settings for a frequency given in kHz. Invalid input throws;
 * an unreachable frequency returns undefined.
 *
 * @example
 * ```typescript
 * pllConfig(480_000); // { referenceDivider: 1, feedbackDivider: 120, postDivider1: 3, postDivider2: 1 }
 * ```
 */
export function pllConfig(
  khz: number | string,
  params: ClockParameters = RP2040_CLOCK_PARAMETERS,
  options: SearchOptions = {},
): PLLConfig | undefined {
  return search(khzToHz(parseFrequencyKhz(khz)), params, options);
}
