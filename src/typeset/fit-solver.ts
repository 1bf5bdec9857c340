import type { Bbox } from '@/types/geometry';
import type { MetricsProvider } from '@/types/metrics';
import type { LaidOutLine, Orientation, RegionStyle, RenderPlanStatus } from '@/types/region';
import { TypesetErrorCode } from '@/types/typeset-errors';
import type { FontRange } from '@/utils/config';
import { normalizeTranslatedText } from '@/utils/text-normalize';
import { blockThickness, breakLines, maxLineExtent, type LineBreakResult } from './line-breaker';

export interface FitInput {
  text: string;
  box: Bbox;
  orientation: Orientation;
  style: RegionStyle;
  fontRange: FontRange;
  innerPaddingPx: number;
  metrics: MetricsProvider;
}

export interface FitResult {
  status: RenderPlanStatus;
  overflow: boolean;
  pinnedSizeRejected: boolean;
  hadForcedBreak: boolean;
  text: string;
  fontFamily: string;
  fontFallbackFrom: string | null;
  fontSize: number;
  lineGap: number;
  lines: LaidOutLine[];
  innerBox: Bbox;
  issues: TypesetErrorCode[];
}

type Candidate = {
  size: number;
  layout: LineBreakResult;
  feasible: boolean;
};

export const innerBoxOf = (box: Bbox, padding: number): Bbox => ({
  x: box.x + padding,
  y: box.y + padding,
  width: box.width - 2 * padding,
  height: box.height - 2 * padding,
});

export const isDegenerate = (inner: Bbox): boolean => inner.width <= 0 || inner.height <= 0;

/**
 * Picks the largest integer font size in the configured range whose wrapped
 * block fits the padded box. Falls back to the minimum size with
 * `overflow` set when nothing fits; text is never dropped.
 */
export const solveFit = (input: FitInput): FitResult => {
  const text = normalizeTranslatedText(input.text);
  const innerBox = innerBoxOf(input.box, input.innerPaddingPx);
  const horizontal = input.orientation === 'horizontal';
  const lineLimit = horizontal ? innerBox.width : innerBox.height;
  const crossLimit = horizontal ? innerBox.height : innerBox.width;
  const requestedFamily = input.style.fontFamily;

  const base: FitResult = {
    status: 'empty',
    overflow: false,
    pinnedSizeRejected: false,
    hadForcedBreak: false,
    text,
    fontFamily: requestedFamily,
    fontFallbackFrom: null,
    fontSize: 0,
    lineGap: 0,
    lines: [],
    innerBox,
    issues: [],
  };

  if (isDegenerate(innerBox)) {
    return { ...base, status: 'degenerate', issues: [TypesetErrorCode.DEGENERATE_BOX] };
  }
  if (!text) {
    return base;
  }

  const evaluate = (size: number): Candidate => {
    const layout = breakLines({
      text,
      fontFamily: requestedFamily,
      fontSize: size,
      maxExtent: lineLimit,
      orientation: input.orientation,
      metrics: input.metrics,
    });
    const feasible =
      !layout.hadForcedBreak &&
      maxLineExtent(layout.lines) <= lineLimit &&
      blockThickness(layout.lines, layout.lineGap) <= crossLimit;
    return { size, layout, feasible };
  };

  const search = (): Candidate | null => {
    let low = input.fontRange.minPx;
    let high = input.fontRange.maxPx;
    let best: Candidate | null = null;
    while (low <= high) {
      const size = Math.floor((low + high) / 2);
      const candidate = evaluate(size);
      if (candidate.feasible) {
        best = candidate;
        low = size + 1;
      } else {
        high = size - 1;
      }
    }
    return best;
  };

  const finish = (candidate: Candidate, overflow: boolean, pinnedSizeRejected: boolean): FitResult => {
    const issues: TypesetErrorCode[] = [];
    if (overflow) issues.push(TypesetErrorCode.INFEASIBLE_FIT);
    if (candidate.layout.fallback) issues.push(TypesetErrorCode.UNKNOWN_FONT);
    return {
      ...base,
      status: overflow ? 'overflow' : 'ok',
      overflow,
      pinnedSizeRejected,
      hadForcedBreak: candidate.layout.hadForcedBreak,
      fontFamily: candidate.layout.fontFamily,
      fontFallbackFrom: candidate.layout.fallback ? requestedFamily : null,
      fontSize: candidate.size,
      lineGap: candidate.layout.lineGap,
      lines: candidate.layout.lines,
      issues,
    };
  };

  const hint = input.style.fontSizeHint;
  if (hint !== undefined && hint > 0) {
    const pinned = evaluate(hint);
    if (pinned.feasible) {
      return finish(pinned, false, false);
    }
    const searched = search();
    return finish(searched ?? evaluate(input.fontRange.minPx), true, true);
  }

  const searched = search();
  if (searched) {
    return finish(searched, false, false);
  }
  return finish(evaluate(input.fontRange.minPx), true, false);
};
