import type { MetricsProvider } from '@/types/metrics';
import type { LaidOutLine, Orientation } from '@/types/region';
import { containsCjk } from '@/utils/text-normalize';

export interface LineBreakInput {
  text: string;
  fontFamily: string;
  fontSize: number;
  /** Longest a line may run along its reading direction. */
  maxExtent: number;
  orientation: Orientation;
  metrics: MetricsProvider;
}

export interface LineBreakResult {
  lines: LaidOutLine[];
  hadForcedBreak: boolean;
  lineGap: number;
  fontFamily: string;
  fallback: boolean;
}

export interface RunMeasure {
  extent: number;
  thickness: number;
  lineGap: number;
  fontFamily: string;
  fallback: boolean;
}

/**
 * Measures a run along its reading direction. A vertical run stacks its
 * glyphs, so its extent is the sum of glyph heights and its thickness the
 * widest glyph.
 */
export const measureRun = (
  metrics: MetricsProvider,
  fontFamily: string,
  fontSize: number,
  text: string,
  orientation: Orientation
): RunMeasure => {
  if (orientation === 'horizontal') {
    const measured = metrics.measure(fontFamily, fontSize, text);
    return {
      extent: measured.width,
      thickness: measured.height,
      lineGap: measured.lineGap,
      fontFamily: measured.fontFamily,
      fallback: measured.fallback,
    };
  }

  const probe = metrics.measure(fontFamily, fontSize, '');
  let extent = 0;
  let thickness = 0;
  for (const glyph of text) {
    const measured = metrics.measure(fontFamily, fontSize, glyph);
    extent += measured.height;
    thickness = Math.max(thickness, measured.width);
  }
  return {
    extent,
    thickness,
    lineGap: probe.lineGap,
    fontFamily: probe.fontFamily,
    fallback: probe.fallback,
  };
};

export interface Token {
  text: string;
  /** Separator placed before the token when it continues a line. */
  joiner: string;
}

/**
 * Splits on whitespace, then breaks CJK runs inside a word into single
 * glyphs. Glyphs of the same word rejoin with no space.
 */
export const tokenize = (paragraph: string): Token[] => {
  const tokens: Token[] = [];
  for (const word of paragraph.split(/\s+/).filter(Boolean)) {
    let joiner = ' ';
    let run = '';
    for (const glyph of word) {
      if (!containsCjk(glyph)) {
        run += glyph;
        continue;
      }
      if (run) {
        tokens.push({ text: run, joiner });
        joiner = '';
        run = '';
      }
      tokens.push({ text: glyph, joiner });
      joiner = '';
    }
    if (run) {
      tokens.push({ text: run, joiner });
    }
  }
  return tokens;
};

/**
 * Greedy wrap. Tokens are never split: one longer than `maxExtent` gets a line
 * of its own and is flagged as overflowing.
 */
export const breakLines = (input: LineBreakInput): LineBreakResult => {
  const { metrics, fontFamily, fontSize, orientation, maxExtent } = input;
  const measure = (text: string): RunMeasure =>
    measureRun(metrics, fontFamily, fontSize, text, orientation);

  const base = measure('');
  const lines: LaidOutLine[] = [];
  let hadForcedBreak = false;

  const pushLine = (text: string): void => {
    const measured = measure(text);
    const overflow = measured.extent > maxExtent;
    if (overflow) hadForcedBreak = true;
    lines.push({
      text,
      extent: measured.extent,
      thickness: measured.thickness,
      overflow,
    });
  };

  for (const paragraph of input.text.split('\n')) {
    let current = '';
    for (const token of tokenize(paragraph)) {
      if (!current) {
        current = token.text;
        continue;
      }
      const candidate = `${current}${token.joiner}${token.text}`;
      if (measure(candidate).extent <= maxExtent) {
        current = candidate;
      } else {
        pushLine(current);
        current = token.text;
      }
    }
    if (current) {
      pushLine(current);
    }
  }

  return {
    lines,
    hadForcedBreak,
    lineGap: base.lineGap,
    fontFamily: base.fontFamily,
    fallback: base.fallback,
  };
};

/** Σ thickness + (n − 1) · lineGap */
export const blockThickness = (lines: LaidOutLine[], lineGap: number): number => {
  if (lines.length === 0) return 0;
  const sum = lines.reduce((total, line) => total + line.thickness, 0);
  return sum + (lines.length - 1) * lineGap;
};

export const maxLineExtent = (lines: LaidOutLine[]): number =>
  lines.reduce((max, line) => Math.max(max, line.extent), 0);
