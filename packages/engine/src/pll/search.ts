/**
 * Divider search.
 *
 * Walks every (REFDIV, FBDIV, PD1, PD2) tuple the hardware accepts and keeps
 * the one whose output is closest to the target:
 *
 *   fref = fin / REFDIV          (must be >= minReferenceFrequencyHz)
 *   fvco = fref * FBDIV          (must lie within [vcoMinHz, vcoMaxHz])
 *   fout = fvco / (PD1 * PD2)    (PD1 >= PD2)
 *
 * Order: REFDIV ascending, FBDIV descending, PD1 ascending, PD2 ascending up
 * to PD1. Equal-error solutions are ranked by VCO frequency (highest first,
 * or lowest with `preferLowVco`), then by the smaller post-divider product.
 */
import { inRange, validateClockParameters, validateSearchOptions } from './parameters.js';
import type {
  ClockParameters,
  DividerCandidate,
  EvaluatedCandidate,
  PLLConfig,
  SearchOptions,
} from './types.js';

/** Errors closer than this are treated as equal. */
export const TIE_TOLERANCE_HZ = 1e-6;

export function referenceFrequencyHz(params: ClockParameters, referenceDivider: number): number {
  return params.inputFrequencyHz / referenceDivider;
}

export function vcoFrequencyHz(params: ClockParameters, referenceDivider: number, feedbackDivider: number): number {
  // Single rounding step so equal VCOs from different REFDIV/FBDIV pairs compare equal
  return (params.inputFrequencyHz * feedbackDivider) / referenceDivider;
}

export function postDividerProduct(candidate: DividerCandidate): number {
  return candidate.postDivider1 * candidate.postDivider2;
}

/**
 * Enumerate every candidate satisfying the REFDIV, reference frequency,
 * FBDIV, VCO and post-divider constraints, in search order.
 */
export function* feasibleCandidates(params: ClockParameters, options: SearchOptions = {}): Generator<DividerCandidate> {
  const { referenceDividerRange: refRange, feedbackDividerRange: fbRange, postDividerRange: pdRange } = params;
  const locked = options.lockedReferenceDivider;
  const refFirst = locked ?? refRange.min;
  const refLast = locked ?? refRange.max;

  for (let referenceDivider = refFirst; referenceDivider <= refLast; referenceDivider++) {
    if (!inRange(referenceDivider, refRange)) continue;
    if (referenceFrequencyHz(params, referenceDivider) < params.minReferenceFrequencyHz) continue;

    for (let feedbackDivider = fbRange.max; feedbackDivider >= fbRange.min; feedbackDivider--) {
      const vco = vcoFrequencyHz(params, referenceDivider, feedbackDivider);
      if (vco < params.vcoMinHz || vco > params.vcoMaxHz) continue;

      for (let postDivider1 = pdRange.min; postDivider1 <= pdRange.max; postDivider1++) {
        for (let postDivider2 = pdRange.min; postDivider2 <= postDivider1; postDivider2++) {
          yield { referenceDivider, feedbackDivider, postDivider1, postDivider2 };
        }
      }
    }
  }
}

export function evaluateCandidate(
  candidate: DividerCandidate,
  targetFrequencyHz: number,
  params: ClockParameters,
): EvaluatedCandidate {
  const vco = vcoFrequencyHz(params, candidate.referenceDivider, candidate.feedbackDivider);
  const output = vco / postDividerProduct(candidate);
  return {
    referenceDivider: candidate.referenceDivider,
    feedbackDivider: candidate.feedbackDivider,
    postDivider1: candidate.postDivider1,
    postDivider2: candidate.postDivider2,
    referenceFrequencyHz: referenceFrequencyHz(params, candidate.referenceDivider),
    vcoFrequencyHz: vco,
    outputFrequencyHz: output,
    absoluteErrorHz: Math.abs(output - targetFrequencyHz),
  };
}

/** True when `candidate` should replace `best`. */
function outranks(candidate: EvaluatedCandidate, best: EvaluatedCandidate, preferLowVco: boolean): boolean {
  if (candidate.absoluteErrorHz < best.absoluteErrorHz - TIE_TOLERANCE_HZ) return true;
  if (candidate.absoluteErrorHz > best.absoluteErrorHz + TIE_TOLERANCE_HZ) return false;

  if (candidate.vcoFrequencyHz !== best.vcoFrequencyHz) {
    return preferLowVco
      ? candidate.vcoFrequencyHz < best.vcoFrequencyHz
      : candidate.vcoFrequencyHz > best.vcoFrequencyHz;
  }
  return postDividerProduct(candidate) < postDividerProduct(best);
}

/**
 * Find the feasible candidate closest to `targetFrequencyHz`, with its
 * derived frequencies. Returns undefined when no candidate exists, or when
 * none comes closer to the target than a zero output would.
 */
export function searchEvaluated(
  targetFrequencyHz: number,
  params: ClockParameters,
  options: SearchOptions = {},
): EvaluatedCandidate | undefined {
  if (!Number.isFinite(targetFrequencyHz) || targetFrequencyHz <= 0) {
    throw new RangeError(`Target frequency must be a positive number of Hz (got ${targetFrequencyHz})`);
  }
  validateClockParameters(params);
  validateSearchOptions(options);

  const preferLowVco = options.preferLowVco === true;
  let best: EvaluatedCandidate | undefined;

  for (const candidate of feasibleCandidates(params, options)) {
    const evaluated = evaluateCandidate(candidate, targetFrequencyHz, params);
    if (best === undefined) {
      if (evaluated.absoluteErrorHz < targetFrequencyHz - TIE_TOLERANCE_HZ) best = evaluated;
    } else if (outranks(evaluated, best, preferLowVco)) {
      best = evaluated;
    }
  }

  return best;
}

export function toPLLConfig(candidate: DividerCandidate): PLLConfig {
  return {
    referenceDivider: candidate.referenceDivider,
    feedbackDivider: candidate.feedbackDivider,
    postDivider1: candidate.postDivider1,
    postDivider2: candidate.postDivider2,
  };
}

/**
 * Divider settings for `targetFrequencyHz`, or undefined when the
 * constraints admit no configuration.
 */
export function search(
  targetFrequencyHz: number,
  params: ClockParameters,
  options: SearchOptions = {},
): PLLConfig | undefined {
  const best = searchEvaluated(targetFrequencyHz, params, options);
  return best && toPLLConfig(best);
}
