/*
 * Validation of clock parameters and search options.
 */
import type { ClockParameters, DividerRange, SearchOptions } from './types.js';

export class ClockParameterError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super('Invalid clock parameters:\n' + problems.map(p => ` - ${p}`).join('\n'));
    this.name = 'ClockParameterError';
    this.problems = problems;
  }
}

function isPositiveInteger(value: number): boolean {
  return Number.isSafeInteger(value) && value > 0;
}

function isPositiveFrequency(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

function checkRange(name: string, range: DividerRange, problems: string[]): void {
  if (!isPositiveInteger(range.min)) problems.push(`${name}.min must be a positive integer (got ${range.min})`);
  if (!isPositiveInteger(range.max)) problems.push(`${name}.max must be a positive integer (got ${range.max})`);
  if (range.min > range.max) problems.push(`${name} is empty (${range.min} > ${range.max})`);
}

/**
 * Collect every invariant violation in `params`; throws a single
 * ClockParameterError listing them.
 */
export function validateClockParameters(params: ClockParameters): void {
  const problems: string[] = [];

  if (!isPositiveFrequency(params.inputFrequencyHz)) {
    problems.push(`inputFrequencyHz must be positive (got ${params.inputFrequencyHz})`);
  }
  if (!isPositiveFrequency(params.minReferenceFrequencyHz)) {
    problems.push(`minReferenceFrequencyHz must be positive (got ${params.minReferenceFrequencyHz})`);
  }
  if (!isPositiveFrequency(params.vcoMinHz)) problems.push(`vcoMinHz must be positive (got ${params.vcoMinHz})`);
  if (!isPositiveFrequency(params.vcoMaxHz)) problems.push(`vcoMaxHz must be positive (got ${params.vcoMaxHz})`);
  if (!(params.vcoMinHz < params.vcoMaxHz)) {
    problems.push(`vcoMinHz must be below vcoMaxHz (${params.vcoMinHz} >= ${params.vcoMaxHz})`);
  }

  checkRange('referenceDividerRange', params.referenceDividerRange, problems);
  checkRange('feedbackDividerRange', params.feedbackDividerRange, problems);
  checkRange('postDividerRange', params.postDividerRange, problems);

  if (problems.length > 0) throw new ClockParameterError(problems);
}

export function validateSearchOptions(options: SearchOptions): void {
  const locked = options.lockedReferenceDivider;
  if (locked !== undefined && !isPositiveInteger(locked)) {
    throw new ClockParameterError([`lockedReferenceDivider must be a positive integer (got ${locked})`]);
  }
}

export function inRange(value: number, range: DividerRange): boolean {
  return value >= range.min && value <= range.max;
}
