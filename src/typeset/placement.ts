import type { Bbox } from '@/types/geometry';
import type { Alignment, LaidOutLine, Orientation, PlacedLine } from '@/types/region';
import { blockThickness } from './line-breaker';

export interface PlacementInput {
  lines: LaidOutLine[];
  lineGap: number;
  innerBox: Bbox;
  alignment: Alignment;
  orientation: Orientation;
}

export interface PlacementResult {
  lines: PlacedLine[];
  blockBox: Bbox;
}

const alignOffset = (alignment: Alignment, available: number, used: number): number => {
  switch (alignment) {
    case 'left':
      return 0;
    case 'center':
      return (available - used) / 2;
    case 'right':
      return available - used;
  }
};

const boundsOf = (lines: PlacedLine[], orientation: Orientation): Bbox => {
  if (lines.length === 0) return { x: 0, y: 0, width: 0, height: 0 };
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const line of lines) {
    const width = orientation === 'horizontal' ? line.extent : line.thickness;
    const height = orientation === 'horizontal' ? line.thickness : line.extent;
    minX = Math.min(minX, line.x);
    minY = Math.min(minY, line.y);
    maxX = Math.max(maxX, line.x + width);
    maxY = Math.max(maxY, line.y + height);
  }
  return { x: minX, y: minY, width: maxX - minX, height: maxY - minY };
};

/**
 * Assigns each line its top-left origin inside the padded box. Rows align
 * horizontally per `alignment` and the block is centred vertically. Columns
 * are laid right-to-left, the block is centred horizontally and `alignment`
 * acts along the column (left = top, right = bottom).
 */
export const placeLines = (input: PlacementInput): PlacementResult => {
  const { innerBox, lineGap, alignment } = input;
  const block = blockThickness(input.lines, lineGap);
  const placed: PlacedLine[] = [];

  if (input.orientation === 'horizontal') {
    let cursorY = innerBox.y + (innerBox.height - block) / 2;
    for (const line of input.lines) {
      placed.push({
        ...line,
        x: innerBox.x + alignOffset(alignment, innerBox.width, line.extent),
        y: cursorY,
      });
      cursorY += line.thickness + lineGap;
    }
  } else {
    let cursorRight = innerBox.x + (innerBox.width + block) / 2;
    for (const line of input.lines) {
      placed.push({
        ...line,
        x: cursorRight - line.thickness,
        y: innerBox.y + alignOffset(alignment, innerBox.height, line.extent),
      });
      cursorRight -= line.thickness + lineGap;
    }
  }

  return { lines: placed, blockBox: boundsOf(placed, input.orientation) };
};
