import type { ClockParameters } from '../../pll/types.js';

export const RP2040_XOSC_HZ = 12_000_000; // 12 MHz crystal

/**
 * PLL limits from the RP2040 datasheet (sys and usb PLLs are identical).
 * REFDIV is a 6-bit field; the 5 MHz reference minimum caps it at 2 with
 * the 12 MHz crystal.
 */
export const RP2040_CLOCK_PARAMETERS: ClockParameters = Object.freeze({
  inputFrequencyHz: RP2040_XOSC_HZ,
  minReferenceFrequencyHz: 5_000_000,
  vcoMinHz: 750_000_000,
  vcoMaxHz: 1_600_000_000,
  referenceDividerRange: Object.freeze({ min: 1, max: 63 }),
  feedbackDividerRange: Object.freeze({ min: 16, max: 320 }),
  postDividerRange: Object.freeze({ min: 1, max: 7 }),
});

export default RP2040_CLOCK_PARAMETERS;
