import { RP2040_CLOCK_PARAMETERS } from '../src/chips/rp2040/clockParameters';
import {
  TIE_TOLERANCE_HZ,
  evaluateCandidate,
  feasibleCandidates,
  postDividerProduct,
  search,
  searchEvaluated,
} from '../src/pll/search';
import type { ClockParameters, EvaluatedCandidate } from '../src/pll/types';

const MHZ = 1_000_000;
const params = RP2040_CLOCK_PARAMETERS;

function allEvaluated(target: number, p: ClockParameters = params): EvaluatedCandidate[] {
  return Array.from(feasibleCandidates(p), c => evaluateCandidate(c, target, p));
}

describe('searchEvaluated with RP2040 defaults', () => {
  test('480 MHz is an exact match at the highest VCO', () => {
    const result = searchEvaluated(480 * MHZ, params);
    expect(result).toEqual({
      referenceDivider: 1,
      feedbackDivider: 120,
      postDivider1: 3,
      postDivider2: 1,
      referenceFrequencyHz: 12 * MHZ,
      vcoFrequencyHz: 1440 * MHZ,
      outputFrequencyHz: 480 * MHZ,
      absoluteErrorHz: 0,
    });
  });

  const cases: Array<[number, number, number, number, number, number]> = [
    // [target MHz, refdiv, fbdiv, pd1, pd2, vco MHz]
    [250, 1, 125, 3, 2, 1500],
    [176, 1, 132, 3, 3, 1584],
    [133, 1, 133, 4, 3, 1596],
    [130, 1, 130, 4, 3, 1560],
    [125, 1, 125, 4, 3, 1500],
    [100, 1, 125, 5, 3, 1500],
    [48, 1, 120, 6, 5, 1440],
    [32, 1, 112, 7, 6, 1344],
    [20, 1, 70, 7, 6, 840],
  ];

  test.each(cases)('%d MHz -> refdiv %d fbdiv %d postdiv %d x %d', (target, refdiv, fbdiv, pd1, pd2, vco) => {
    const result = searchEvaluated(target * MHZ, params);
    expect(result).toBeDefined();
    expect(result?.referenceDivider).toBe(refdiv);
    expect(result?.feedbackDivider).toBe(fbdiv);
    expect(result?.postDivider1).toBe(pd1);
    expect(result?.postDivider2).toBe(pd2);
    expect(result?.vcoFrequencyHz).toBe(vco * MHZ);
    expect(result?.absoluteErrorHz).toBe(0);
  });

  test('equal-error solutions across reference dividers resolve to the higher VCO', () => {
    // 21 MHz is exact at refdiv 1 (756 MHz VCO) and refdiv 2 (882 MHz VCO)
    const result = search(21 * MHZ, params);
    expect(result).toEqual({ referenceDivider: 2, feedbackDivider: 147, postDivider1: 7, postDivider2: 6 });
  });

  test('preferLowVco flips the VCO tie-break', () => {
    expect(search(21 * MHZ, params, { preferLowVco: true })).toEqual({
      referenceDivider: 1,
      feedbackDivider: 63,
      postDivider1: 6,
      postDivider2: 6,
    });
    expect(search(480 * MHZ, params, { preferLowVco: true })).toEqual({
      referenceDivider: 1,
      feedbackDivider: 80,
      postDivider1: 2,
      postDivider2: 1,
    });
  });

  test('lockedReferenceDivider restricts the search', () => {
    expect(search(125 * MHZ, params, { lockedReferenceDivider: 2 })).toEqual({
      referenceDivider: 2,
      feedbackDivider: 250,
      postDivider1: 4,
      postDivider2: 3,
    });
    // 12 MHz / 3 = 4 MHz is below the 5 MHz reference minimum
    expect(search(125 * MHZ, params, { lockedReferenceDivider: 3 })).toBeUndefined();
    // outside the REFDIV field
    expect(search(125 * MHZ, params, { lockedReferenceDivider: 64 })).toBeUndefined();
  });

  test('targets above the VCO ceiling return the closest reachable output', () => {
    const result = searchEvaluated(2000 * MHZ, params);
    expect(result?.referenceDivider).toBe(1);
    expect(result?.feedbackDivider).toBe(133);
    expect(result?.postDivider1).toBe(1);
    expect(result?.postDivider2).toBe(1);
    expect(result?.outputFrequencyHz).toBe(1596 * MHZ);
    expect(result?.absoluteErrorHz).toBe(404 * MHZ);
    expect(result?.vcoFrequencyHz).toBeLessThanOrEqual(params.vcoMaxHz);
  });

  test('targets below the lowest output come back as the slowest configuration while it is still closer than zero', () => {
    const result = searchEvaluated(8 * MHZ, params);
    expect(result).toMatchObject({ referenceDivider: 2, feedbackDivider: 125, postDivider1: 7, postDivider2: 7 });
    expect(result?.outputFrequencyHz).toBeCloseTo(750_000_000 / 49, 6);
  });

  test('targets too low for any post-divider combination are absent', () => {
    expect(search(1 * MHZ, params)).toBeUndefined();
    expect(search(7 * MHZ, params)).toBeUndefined();
  });

  test('rejects non-positive targets', () => {
    expect(() => search(0, params)).toThrow(RangeError);
    expect(() => search(-5, params)).toThrow(RangeError);
    expect(() => search(Number.NaN, params)).toThrow(RangeError);
  });
});

describe('search properties', () => {
  const targets = [10, 12.288, 15, 24, 33.333, 44.1, 50, 96, 120, 150, 200, 266, 333, 400, 1000].map(t => Math.round(t * MHZ));

  test('is deterministic', () => {
    for (const t of targets) {
      expect(searchEvaluated(t, params)).toEqual(searchEvaluated(t, params));
    }
  });

  test('every result satisfies the feasibility constraints', () => {
    for (const t of targets) {
      const r = searchEvaluated(t, params);
      if (!r) continue;
      const ref = params.inputFrequencyHz / r.referenceDivider;
      const vco = ref * r.feedbackDivider;
      expect(r.referenceDivider).toBeGreaterThanOrEqual(params.referenceDividerRange.min);
      expect(r.referenceDivider).toBeLessThanOrEqual(params.referenceDividerRange.max);
      expect(ref).toBeGreaterThanOrEqual(params.minReferenceFrequencyHz);
      expect(r.feedbackDivider).toBeGreaterThanOrEqual(params.feedbackDividerRange.min);
      expect(r.feedbackDivider).toBeLessThanOrEqual(params.feedbackDividerRange.max);
      expect(vco).toBeGreaterThanOrEqual(params.vcoMinHz);
      expect(vco).toBeLessThanOrEqual(params.vcoMaxHz);
      expect(r.postDivider1).toBeGreaterThanOrEqual(r.postDivider2);
      expect(r.postDivider2).toBeGreaterThanOrEqual(params.postDividerRange.min);
      expect(r.postDivider1).toBeLessThanOrEqual(params.postDividerRange.max);
      expect(r.outputFrequencyHz).toBeCloseTo(vco / (r.postDivider1 * r.postDivider2), 3);
    }
  });

  test('no feasible candidate is closer than the result', () => {
    for (const t of targets) {
      const r = searchEvaluated(t, params);
      expect(r).toBeDefined();
      if (!r) continue;
      for (const c of allEvaluated(t)) {
        expect(r.absoluteErrorHz).toBeLessThanOrEqual(c.absoluteErrorHz + TIE_TOLERANCE_HZ);
      }
    }
  });

  test('ties resolve to the highest VCO, then the smallest post-divider product', () => {
    for (let t = 20 * MHZ; t <= 60 * MHZ; t += MHZ / 2) {
      const r = searchEvaluated(t, params);
      if (!r) continue;
      const tied = allEvaluated(t).filter(c => Math.abs(c.absoluteErrorHz - r.absoluteErrorHz) <= TIE_TOLERANCE_HZ);
      const topVco = Math.max(...tied.map(c => c.vcoFrequencyHz));
      const smallestProduct = Math.min(
        ...tied.filter(c => c.vcoFrequencyHz === topVco).map(c => postDividerProduct(c)),
      );
      expect(r.vcoFrequencyHz).toBe(topVco);
      expect(postDividerProduct(r)).toBe(smallestProduct);
    }
  });
});

describe('search with custom parameters', () => {
  test('prefers the smaller post-divider product at equal VCO and error', () => {
    const p: ClockParameters = {
      inputFrequencyHz: 12 * MHZ,
      minReferenceFrequencyHz: 1 * MHZ,
      vcoMinHz: 1000 * MHZ,
      vcoMaxHz: 1600 * MHZ,
      referenceDividerRange: { min: 1, max: 1 },
      feedbackDividerRange: { min: 100, max: 100 },
      postDividerRange: { min: 1, max: 4 },
    };
    // 350 MHz sits halfway between 1200/4 (found first as 2x2) and 1200/3
    expect(search(350 * MHZ, p)).toEqual({
      referenceDivider: 1,
      feedbackDivider: 100,
      postDivider1: 3,
      postDivider2: 1,
    });
  });

  test('an unreachable VCO window means absence for every target', () => {
    // VCO steps are 6 MHz apart (1200, 1206, ...): nothing lands in (1201, 1205)
    const p: ClockParameters = { ...params, vcoMinHz: 1201 * MHZ, vcoMaxHz: 1205 * MHZ };
    expect(Array.from(feasibleCandidates(p))).toHaveLength(0);
    for (const t of [1, 48, 125, 480, 1203]) {
      expect(search(t * MHZ, p)).toBeUndefined();
    }
  });

  test('post-divider pairs are enumerated with the larger divider first', () => {
    const p: ClockParameters = {
      ...params,
      referenceDividerRange: { min: 1, max: 1 },
      feedbackDividerRange: { min: 100, max: 100 },
      postDividerRange: { min: 1, max: 3 },
    };
    const pairs = Array.from(feasibleCandidates(p), c => [c.postDivider1, c.postDivider2]);
    expect(pairs).toEqual([[1, 1], [2, 1], [2, 2], [3, 1], [3, 2], [3, 3]]);
  });

  test('feedback dividers are walked from the top down', () => {
    const p: ClockParameters = {
      ...params,
      referenceDividerRange: { min: 1, max: 1 },
      feedbackDividerRange: { min: 130, max: 140 },
      postDividerRange: { min: 1, max: 1 },
    };
    // 12 MHz * 134 = 1608 MHz is above the VCO ceiling
    expect(Array.from(feasibleCandidates(p), c => c.feedbackDivider)).toEqual([133, 132, 131, 130]);
  });

  test('invalid parameters are rejected before searching', () => {
    const p: ClockParameters = { ...params, vcoMinHz: 2000 * MHZ };
    expect(() => search(480 * MHZ, p)).toThrow('vcoMinHz must be below vcoMaxHz');
  });
});
