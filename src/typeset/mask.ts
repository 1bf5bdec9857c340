import type { Bbox } from '@/types/geometry';
import { TypesetErrorCode } from '@/types/typeset-errors';
import { logWarning } from '@/utils/logging';

export interface MaskBox {
  id: string;
  box: Bbox;
}

export interface MaskInput {
  boxes: MaskBox[];
  imageWidth: number;
  imageHeight: number;
  paddingPx: number;
  dilationPx: number;
}

export interface MaskSkip {
  id: string;
  code: TypesetErrorCode;
}

export interface MaskComponent {
  bounds: Bbox;
  pixelCount: number;
}

export interface MaskResult {
  width: number;
  height: number;
  /** One byte per pixel: 255 = erase, 0 = keep. */
  data: Uint8Array;
  /** Expanded, clamped rectangles that were rasterised, keyed by box id. */
  rectangles: MaskBox[];
  components: MaskComponent[];
  skipped: MaskSkip[];
}

const clamp = (value: number, min: number, max: number): number =>
  Math.max(min, Math.min(max, value));

/** Grows a box by `padding` on every side, snapped outward to whole pixels and clamped to the image. */
export const expandAndClamp = (
  box: Bbox,
  padding: number,
  imageWidth: number,
  imageHeight: number
): Bbox => {
  const x = clamp(Math.floor(box.x - padding), 0, imageWidth);
  const y = clamp(Math.floor(box.y - padding), 0, imageHeight);
  const maxX = clamp(Math.ceil(box.x + box.width + padding), 0, imageWidth);
  const maxY = clamp(Math.ceil(box.y + box.height + padding), 0, imageHeight);
  return { x, y, width: Math.max(0, maxX - x), height: Math.max(0, maxY - y) };
};

export const fillRect = (mask: Uint8Array, width: number, rect: Bbox): void => {
  for (let y = rect.y; y < rect.y + rect.height; y += 1) {
    mask.fill(255, y * width + rect.x, y * width + rect.x + rect.width);
  }
};

/**
 * Square-kernel dilation via a summed-area table; O(width · height) for any
 * radius. The radius is rounded to whole pixels.
 */
export const dilateMask = (
  mask: Uint8Array,
  width: number,
  height: number,
  radiusPx: number
): Uint8Array => {
  const radius = Math.round(radiusPx);
  if (Number.isNaN(radius) || radius <= 0) return mask;
  const w1 = width + 1;
  const integral = new Uint32Array((width + 1) * (height + 1));
  for (let y = 1; y <= height; y += 1) {
    let rowSum = 0;
    for (let x = 1; x <= width; x += 1) {
      rowSum += (mask[(y - 1) * width + (x - 1)] ?? 0) > 0 ? 1 : 0;
      integral[y * w1 + x] = (integral[(y - 1) * w1 + x] ?? 0) + rowSum;
    }
  }

  const at = (x: number, y: number): number => integral[y * w1 + x] ?? 0;
  const output = new Uint8Array(mask.length);
  for (let y = 0; y < height; y += 1) {
    const y0 = Math.max(0, y - radius);
    const y1 = Math.min(height - 1, y + radius);
    for (let x = 0; x < width; x += 1) {
      const x0 = Math.max(0, x - radius);
      const x1 = Math.min(width - 1, x + radius);
      const sum = at(x1 + 1, y1 + 1) - at(x1 + 1, y0) - at(x0, y1 + 1) + at(x0, y0);
      output[y * width + x] = sum > 0 ? 255 : 0;
    }
  }
  return output;
};

/** 4-connected erase areas, in raster order of their first pixel. */
export const findComponents = (mask: Uint8Array, width: number, height: number): MaskComponent[] => {
  const labels = new Int32Array(mask.length).fill(-1);
  const components: MaskComponent[] = [];
  const stack: number[] = [];

  for (let start = 0; start < mask.length; start += 1) {
    if ((mask[start] ?? 0) === 0 || (labels[start] ?? -1) >= 0) continue;
    const label = components.length;
    let minX = width;
    let minY = height;
    let maxX = -1;
    let maxY = -1;
    let pixelCount = 0;
    labels[start] = label;
    stack.push(start);

    while (stack.length > 0) {
      const index = stack.pop() ?? 0;
      const x = index % width;
      const y = (index - x) / width;
      pixelCount += 1;
      minX = Math.min(minX, x);
      minY = Math.min(minY, y);
      maxX = Math.max(maxX, x);
      maxY = Math.max(maxY, y);

      const neighbours = [
        x > 0 ? index - 1 : -1,
        x < width - 1 ? index + 1 : -1,
        y > 0 ? index - width : -1,
        y < height - 1 ? index + width : -1,
      ];
      for (const next of neighbours) {
        if (next < 0 || (mask[next] ?? 0) === 0 || (labels[next] ?? -1) >= 0) continue;
        labels[next] = label;
        stack.push(next);
      }
    }

    components.push({
      bounds: { x: minX, y: minY, width: maxX - minX + 1, height: maxY - minY + 1 },
      pixelCount,
    });
  }

  return components;
};

export const countMaskPixels = (mask: Uint8Array): number => {
  let count = 0;
  for (let i = 0; i < mask.length; i += 1) {
    if ((mask[i] ?? 0) > 0) count += 1;
  }
  return count;
};

/**
 * Builds the erasure mask for the whole page in one pass. Boxes are unioned
 * before dilation, so neighbouring bubbles become one erase area with no seam
 * between them. The output depends only on the set of boxes, not their order.
 */
export const buildMask = (input: MaskInput): MaskResult => {
  const { imageWidth: width, imageHeight: height } = input;
  const data = new Uint8Array(width * height);
  const rectangles: MaskBox[] = [];
  const skipped: MaskSkip[] = [];

  for (const entry of input.boxes) {
    const rect = expandAndClamp(entry.box, input.paddingPx, width, height);
    if (rect.width === 0 || rect.height === 0) {
      skipped.push({ id: entry.id, code: TypesetErrorCode.MASK_CLAMPED_TO_ZERO });
      logWarning('Mask box clamped to zero area; skipping.', { id: entry.id, box: entry.box });
      continue;
    }
    rectangles.push({ id: entry.id, box: rect });
    fillRect(data, width, rect);
  }

  const dilated = dilateMask(data, width, height, input.dilationPx);
  return {
    width,
    height,
    data: dilated,
    rectangles,
    components: findComponents(dilated, width, height),
    skipped,
  };
};
