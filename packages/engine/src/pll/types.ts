/** Inclusive integer range of divider values. */
export interface DividerRange {
  readonly min: number;
  readonly max: number;
}

/**
 * Fixed hardware constraints of a PLL. All frequencies are in Hz.
 */
export interface ClockParameters {
  readonly inputFrequencyHz: number;
  readonly minReferenceFrequencyHz: number;
  readonly vcoMinHz: number;
  readonly vcoMaxHz: number;
  readonly referenceDividerRange: DividerRange;
  readonly feedbackDividerRange: DividerRange;
  readonly postDividerRange: DividerRange;
}

/**
 * One point of the search space. `postDivider1 >= postDivider2` always holds:
 * the larger divider is cascaded first.
 */
export interface DividerCandidate {
  readonly referenceDivider: number;
  readonly feedbackDivider: number;
  readonly postDivider1: number;
  readonly postDivider2: number;
}

export interface EvaluatedCandidate extends DividerCandidate {
  readonly referenceFrequencyHz: number;
  readonly vcoFrequencyHz: number;
  readonly outputFrequencyHz: number;
  readonly absoluteErrorHz: number;
}

/** Divider settings handed to whatever programs the clock registers. */
export interface PLLConfig {
  readonly referenceDivider: number;
  readonly feedbackDivider: number;
  readonly postDivider1: number;
  readonly postDivider2: number;
}

export interface SearchOptions {
  /** Restrict the search to this reference divider. */
  lockedReferenceDivider?: number;
  /** Among equal-error solutions prefer the lowest VCO frequency instead of the highest. */
  preferLowVco?: boolean;
}
