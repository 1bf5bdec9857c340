import { GlobalFonts, createCanvas, type SKRSContext2D } from '@napi-rs/canvas';
import type { MetricsProvider, TextMetrics } from '@/types/metrics';
import { logWarning } from '@/utils/logging';
import { LINE_GAP_RATIO } from './approximate-metrics';

export interface FontAsset {
  path: string;
  family: string;
}

const tryRegister = (asset: FontAsset): boolean => {
  try {
    return GlobalFonts.registerFromPath(asset.path, asset.family);
  } catch (error) {
    logWarning('Font file could not be registered.', {
      family: asset.family,
      path: asset.path,
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
};

/**
 * Registers font files with the canvas backend. Returns the families that
 * failed to load so the caller can report them.
 */
export const registerFonts = (assets: FontAsset[]): string[] =>
  assets.filter((asset) => !tryRegister(asset)).map((asset) => asset.family);

/**
 * Canvas 2D backed measurement. Heights come from the font bounding box, so
 * they depend only on the font and size, never on the string's glyphs.
 */
export class CanvasMetricsProvider implements MetricsProvider {
  private readonly context: SKRSContext2D;

  constructor(
    private readonly defaultFamily: string,
    private readonly lineGapRatio: number = LINE_GAP_RATIO
  ) {
    this.context = createCanvas(1, 1).getContext('2d');
  }

  measure(fontFamily: string, fontSizePx: number, text: string): TextMetrics {
    const known = GlobalFonts.has(fontFamily);
    const family = known ? fontFamily : this.defaultFamily;
    this.context.font = `${fontSizePx}px "${family}"`;
    const measured = this.context.measureText(text);
    const fontHeight = measured.fontBoundingBoxAscent + measured.fontBoundingBoxDescent;
    return {
      width: measured.width,
      height: fontHeight > 0 ? fontHeight : fontSizePx,
      lineGap: fontSizePx * this.lineGapRatio,
      fontFamily: family,
      fallback: !known,
    };
  }
}
