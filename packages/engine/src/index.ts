export type {
  ClockParameters,
  DividerCandidate,
  DividerRange,
  EvaluatedCandidate,
  PLLConfig,
  SearchOptions,
} from './pll/types.js';
export { RP2040_CLOCK_PARAMETERS, RP2040_XOSC_HZ } from './chips/rp2040/clockParameters.js';
export { ClockParameterError, validateClockParameters, validateSearchOptions } from './pll/parameters.js';
export {
  TIE_TOLERANCE_HZ,
  evaluateCandidate,
  feasibleCandidates,
  postDividerProduct,
  referenceFrequencyHz,
  search,
  searchEvaluated,
  toPLLConfig,
  vcoFrequencyHz,
} from './pll/search.js';
export { FrequencyInputError, khzToHz, parseFrequencyKhz, pllConfig } from './pll/frequency.js';
export { clearPllConfigCache, definePllConfig } from './pll/registry.js';
export { formatHz, renderConfigModule, type RenderOptions } from './pll/render.js';
export * from './util/index.js';
