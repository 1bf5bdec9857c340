import type { Bbox } from '@/types/geometry';
import type { DetectedBlock } from '@/types/collaborators';
import type { MetricsProvider } from '@/types/metrics';
import type {
  Orientation,
  Region,
  RegionSnapshot,
  RegionStyle,
  RenderPlan,
} from '@/types/region';
import {
  bboxSchema,
  resolveEngineConfig,
  type EngineConfig,
  type EngineConfigInput,
} from '@/utils/config';
import { createInvalidBoxError, createRegionNotFoundError } from '@/utils/error-handling';
import { WarningRegistry, logWarning } from '@/utils/logging';
import { buildMask, type MaskResult } from './mask';
import { computeRenderPlan } from './render-plan';

export interface RegionSeed extends DetectedBlock {
  style?: Partial<RegionStyle>;
}

export type LedgerChange =
  | { type: 'seeded'; ids: string[] }
  | { type: 'updated'; id: string; version: number }
  | { type: 'deleted'; id: string }
  | { type: 'cleared' };

export type LedgerListener = (change: LedgerChange) => void;

type Entry = {
  region: Region;
  version: number;
  dirty: boolean;
  plan: RenderPlan | null;
};

const copyBox = (box: Bbox): Bbox => ({ x: box.x, y: box.y, width: box.width, height: box.height });

const sameBox = (a: Bbox, b: Bbox): boolean =>
  a.x === b.x && a.y === b.y && a.width === b.width && a.height === b.height;

const sameStyle = (a: RegionStyle, b: RegionStyle): boolean =>
  a.fontFamily === b.fontFamily &&
  a.fontSizeHint === b.fontSizeHint &&
  a.color === b.color &&
  a.alignment === b.alignment &&
  a.outline?.color === b.outline?.color &&
  a.outline?.widthPx === b.outline?.widthPx;

const validateBox = (box: Bbox): Bbox => {
  const parsed = bboxSchema.safeParse(box);
  if (!parsed.success) {
    throw createInvalidBoxError(box);
  }
  return copyBox(parsed.data);
};

const freezeSnapshot = (entry: Entry): RegionSnapshot => {
  const { region } = entry;
  return Object.freeze({
    ...region,
    sourceBox: Object.freeze(copyBox(region.sourceBox)),
    editBox: Object.freeze(copyBox(region.editBox)),
    style: Object.freeze({
      ...region.style,
      outline: region.style.outline ? Object.freeze({ ...region.style.outline }) : undefined,
    }),
    version: entry.version,
  });
};

const freezePlan = (plan: RenderPlan): RenderPlan => {
  for (const line of plan.lines) {
    Object.freeze(line);
  }
  Object.freeze(plan.lines);
  Object.freeze(plan.issues);
  Object.freeze(plan.innerBox);
  Object.freeze(plan.blockBox);
  if (plan.style.outline) Object.freeze(plan.style.outline);
  Object.freeze(plan.style);
  return Object.freeze(plan);
};

/**
 * Table of regions for one page, keyed by id. Every mutation is applied
 * synchronously and stamps the entry with a new version, so the last write to
 * an id wins and writes to different ids never interact. Render plans are
 * cached per entry and recomputed on the first read after a mutation.
 */
export class RegionLedger {
  readonly config: EngineConfig;
  private readonly entries = new Map<string, Entry>();
  private readonly listeners = new Set<LedgerListener>();
  private readonly warnings = new WarningRegistry();
  private nextIndex = 1;

  constructor(
    private readonly metrics: MetricsProvider,
    config: EngineConfigInput = {}
  ) {
    this.config = resolveEngineConfig(config);
  }

  get size(): number {
    return this.entries.size;
  }

  onChange(listener: LedgerListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Appends one region per detected block. Ids keep counting across {@link clear}. */
  seed(blocks: RegionSeed[]): RegionSnapshot[] {
    const validated = blocks.map((block) => ({ block, box: validateBox(block.box) }));
    const created = validated.map(({ block, box }) => {
      const id = `region-${this.nextIndex}`;
      this.nextIndex += 1;
      const entry: Entry = {
        region: {
          id,
          sourceBox: box,
          editBox: copyBox(box),
          sourceText: block.text,
          translatedText: '',
          orientation: block.orientation ?? 'horizontal',
          style: this.defaultStyle(block.style),
        },
        version: 1,
        dirty: true,
        plan: null,
      };
      this.entries.set(id, entry);
      return freezeSnapshot(entry);
    });
    if (created.length > 0) {
      this.emit({ type: 'seeded', ids: created.map((snapshot) => snapshot.id) });
    }
    return created;
  }

  clear(): void {
    this.entries.clear();
    this.emit({ type: 'cleared' });
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  get(id: string): RegionSnapshot | undefined {
    const entry = this.entries.get(id);
    return entry ? freezeSnapshot(entry) : undefined;
  }

  list(): RegionSnapshot[] {
    return Array.from(this.entries.values(), freezeSnapshot);
  }

  setEditBox(id: string, box: Bbox): RegionSnapshot {
    const next = validateBox(box);
    return this.update(id, (region) => {
      if (sameBox(region.editBox, next)) return false;
      region.editBox = next;
      return true;
    });
  }

  resetEditBox(id: string): RegionSnapshot {
    return this.update(id, (region) => {
      if (sameBox(region.editBox, region.sourceBox)) return false;
      region.editBox = copyBox(region.sourceBox);
      return true;
    });
  }

  setTranslatedText(id: string, text: string): RegionSnapshot {
    return this.update(id, (region) => {
      if (region.translatedText === text) return false;
      region.translatedText = text;
      return true;
    });
  }

  setOrientation(id: string, orientation: Orientation): RegionSnapshot {
    return this.update(id, (region) => {
      if (region.orientation === orientation) return false;
      region.orientation = orientation;
      return true;
    });
  }

  setStyle(id: string, patch: Partial<RegionStyle>): RegionSnapshot {
    return this.update(id, (region) => {
      const next: RegionStyle = { ...region.style, ...patch };
      if (sameStyle(region.style, next)) return false;
      region.style = next;
      return true;
    });
  }

  delete(id: string): boolean {
    const removed = this.entries.delete(id);
    if (removed) {
      this.emit({ type: 'deleted', id });
    }
    return removed;
  }

  /** Current plan for the region, recomputed first if anything it depends on changed. */
  getRenderPlan(id: string): RenderPlan {
    return this.planFor(this.require(id));
  }

  renderPlans(): RenderPlan[] {
    return Array.from(this.entries.values(), (entry) => this.planFor(entry));
  }

  /** True while no mutation has happened since the plan was computed. */
  isCurrent(plan: RenderPlan): boolean {
    const entry = this.entries.get(plan.regionId);
    return entry !== undefined && !entry.dirty && entry.version === plan.version;
  }

  buildMask(image: { width: number; height: number }): MaskResult {
    return buildMask({
      boxes: Array.from(this.entries.values(), (entry) => ({
        id: entry.region.id,
        box: entry.region.editBox,
      })),
      imageWidth: image.width,
      imageHeight: image.height,
      paddingPx: this.config.maskPaddingPx,
      dilationPx: this.config.dilationPx,
    });
  }

  private defaultStyle(overrides: Partial<RegionStyle> = {}): RegionStyle {
    return {
      fontFamily: this.config.defaultFontFamily,
      color: this.config.defaultColor,
      alignment: 'center',
      outline: { ...this.config.defaultOutline },
      ...overrides,
    };
  }

  private require(id: string): Entry {
    const entry = this.entries.get(id);
    if (!entry) {
      throw createRegionNotFoundError(id);
    }
    return entry;
  }

  private update(id: string, mutate: (region: Region) => boolean): RegionSnapshot {
    const entry = this.require(id);
    if (mutate(entry.region)) {
      entry.version += 1;
      entry.dirty = true;
      entry.plan = null;
      this.emit({ type: 'updated', id, version: entry.version });
    }
    return freezeSnapshot(entry);
  }

  private planFor(entry: Entry): RenderPlan {
    if (!entry.dirty && entry.plan) {
      return entry.plan;
    }
    const plan = freezePlan(computeRenderPlan(freezeSnapshot(entry), this.config, this.metrics));
    entry.plan = plan;
    entry.dirty = false;
    this.report(plan);
    return plan;
  }

  private report(plan: RenderPlan): void {
    if (plan.fontFallbackFrom) {
      this.warnings.warnOnce(
        `font:${plan.fontFallbackFrom}`,
        `Font "${plan.fontFallbackFrom}" is unavailable; using "${plan.fontFamily}".`
      );
    }
    if (plan.status === 'degenerate') {
      logWarning('Region has no writable area after padding; not rendered.', {
        id: plan.regionId,
        innerBox: plan.innerBox,
      });
    } else if (plan.overflow) {
      logWarning('Text overflows its box.', {
        id: plan.regionId,
        fontSize: plan.fontSize,
        pinnedSizeRejected: plan.pinnedSizeRejected,
      });
    }
  }

  private emit(change: LedgerChange): void {
    for (const listener of this.listeners) {
      listener(change);
    }
  }
}
