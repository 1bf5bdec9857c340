import type { MetricsProvider, TextMetrics } from '@/types/metrics';
import { containsCjk } from '@/utils/text-normalize';

export const LINE_GAP_RATIO = 0.2;

const glyphWidth = (char: string): number => {
  if (char === ' ') return 0.34;
  if (/[ilI'`.,;:!|]/.test(char)) return 0.26;
  if (/[mwMW@#%&]/.test(char)) return 0.78;
  if (/[A-Z]/.test(char)) return 0.61;
  if (/[0-9]/.test(char)) return 0.53;
  if (containsCjk(char)) return 1;
  return 0.5;
};

/**
 * Font-free metrics from a fixed per-glyph width table (in em units). Glyph
 * boxes are one em tall and lines are separated by {@link LINE_GAP_RATIO} em.
 * Families outside `knownFamilies` are reported as a fallback to `defaultFamily`.
 */
export class ApproximateMetricsProvider implements MetricsProvider {
  private readonly knownFamilies: ReadonlySet<string>;

  constructor(
    private readonly defaultFamily: string,
    knownFamilies: Iterable<string> = []
  ) {
    this.knownFamilies = new Set([defaultFamily, ...knownFamilies]);
  }

  measure(fontFamily: string, fontSizePx: number, text: string): TextMetrics {
    const known = this.knownFamilies.has(fontFamily);
    let ems = 0;
    for (const char of text) {
      ems += glyphWidth(char);
    }
    return {
      width: ems * fontSizePx,
      height: fontSizePx,
      lineGap: fontSizePx * LINE_GAP_RATIO,
      fontFamily: known ? fontFamily : this.defaultFamily,
      fallback: !known,
    };
  }
}
