import type { Bbox } from '@/types/geometry';
import type { DetectedBlock } from '@/types/collaborators';
import { containsCjk } from '@/utils/text-normalize';

const unionBbox = (a: Bbox, b: Bbox): Bbox => {
  const minX = Math.min(a.x, b.x);
  const minY = Math.min(a.y, b.y);
  const maxX = Math.max(a.x + a.width, b.x + b.width);
  const maxY = Math.max(a.y + a.height, b.y + b.height);
  return { x: minX, y: minY, width: maxX - minX, height: maxY - minY };
};

const overlapsHorizontally = (a: Bbox, b: Bbox): boolean =>
  a.x < b.x + b.width && b.x < a.x + a.width;

const joinTexts = (texts: string[]): string => {
  const parts = texts.map((text) => text.trim()).filter(Boolean);
  return parts.join(parts.some(containsCjk) ? '' : ' ');
};

const continues = (previous: DetectedBlock, block: DetectedBlock, gapPx: number): boolean => {
  const gap = block.box.y - (previous.box.y + previous.box.height);
  return gap >= 0 && gap <= gapPx && overlapsHorizontally(previous.box, block.box);
};

/**
 * Merges detector blocks that stack into one bubble. Blocks are visited
 * top-to-bottom; each joins the first group whose last block ends at most
 * `gapPx` above it and overlaps it horizontally.
 */
export const groupDetections = (blocks: DetectedBlock[], gapPx: number): DetectedBlock[] => {
  const sorted = blocks
    .filter((block) => block.box.width > 0 && block.box.height > 0)
    .sort((a, b) => a.box.y - b.box.y || a.box.x - b.box.x);

  const groups: DetectedBlock[][] = [];
  for (const block of sorted) {
    const target = groups.find((group) => {
      const last = group[group.length - 1];
      return last !== undefined && continues(last, block, gapPx);
    });
    if (target) {
      target.push(block);
    } else {
      groups.push([block]);
    }
  }

  return groups.flatMap((group) => {
    const [first, ...rest] = group;
    if (!first) return [];
    return [
      {
        box: rest.reduce((acc, block) => unionBbox(acc, block.box), first.box),
        text: joinTexts(group.map((block) => block.text)),
        orientation: first.orientation,
      },
    ];
  });
};
