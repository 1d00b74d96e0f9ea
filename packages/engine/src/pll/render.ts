/*
 * Renders a search result as the source of a TypeScript constant module so a
 * build step can embed the configuration instead of searching at start-up.
 */
import type { EvaluatedCandidate } from './types.js';

export interface RenderOptions {
  exportName?: string;
}

const IDENTIFIER_RE = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export function formatHz(hz: number): string {
  return Number.isInteger(hz) ? String(hz) : hz.toFixed(3);
}

export function renderConfigModule(khz: number, evaluated: EvaluatedCandidate | undefined, opts: RenderOptions = {}): string {
  const exportName = opts.exportName ?? 'PLL_CONFIG';
  if (!IDENTIFIER_RE.test(exportName)) {
    throw new Error(`Export name '${exportName}' is not a valid identifier`);
  }

  if (!evaluated) {
    return [
      `// No PLL configuration reaches ${khz} kHz.`,
      `export const ${exportName} = undefined;`,
      '',
    ].join('\n');
  }

  const { referenceDivider, feedbackDivider, postDivider1, postDivider2 } = evaluated;
  return [
    `// PLL configuration for ${khz} kHz (refdiv ${referenceDivider}, fbdiv ${feedbackDivider}, postdiv ${postDivider1} x ${postDivider2}).`,
    `// VCO ${formatHz(evaluated.vcoFrequencyHz)} Hz, output ${formatHz(evaluated.outputFrequencyHz)} Hz, error ${formatHz(evaluated.absoluteErrorHz)} Hz.`,
    `export const ${exportName} = {`,
    `  referenceDivider: ${referenceDivider},`,
    `  feedbackDivider: ${feedbackDivider},`,
    `  postDivider1: ${postDivider1},`,
    `  postDivider2: ${postDivider2},`,
    `  vcoFrequencyHz: ${formatHz(evaluated.vcoFrequencyHz)},`,
    `} as const;`,
    '',
  ].join('\n');
}
