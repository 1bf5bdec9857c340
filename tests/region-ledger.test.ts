import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import { ApproximateMetricsProvider } from '../src/metrics/approximate-metrics';
import { RegionLedger, type LedgerChange } from '../src/typeset/region-ledger';
import { isRenderable } from '../src/typeset/render-plan';
import { TypesetError, TypesetErrorCode } from '../src/types/typeset-errors';
import type { EngineConfigInput } from '../src/utils/config';

const createLedger = (config: EngineConfigInput = {}) =>
  new RegionLedger(new ApproximateMetricsProvider('Test Sans'), {
    defaultFontFamily: 'Test Sans',
    fontRange: { minPx: 8, maxPx: 40 },
    innerPaddingPx: 4,
    ...config,
  });

describe('region ledger', () => {
  let warn: MockInstance;

  beforeEach(() => {
    warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('assigns ids that are never reused, even after clearing', () => {
    const ledger = createLedger();
    const first = ledger.seed([
      { box: { x: 0, y: 0, width: 10, height: 10 }, text: 'a' },
      { box: { x: 20, y: 0, width: 10, height: 10 }, text: 'b' },
    ]);
    ledger.clear();
    const second = ledger.seed([{ box: { x: 0, y: 0, width: 10, height: 10 }, text: 'c' }]);

    expect(first.map((region) => region.id)).toEqual(['region-1', 'region-2']);
    expect(second.map((region) => region.id)).toEqual(['region-3']);
    expect(ledger.size).toBe(1);
  });

  it('starts editBox equal to sourceBox and applies defaults', () => {
    const ledger = createLedger();
    const [region] = ledger.seed([{ box: { x: 5, y: 6, width: 70, height: 40 }, text: 'src' }]);

    expect(region!.editBox).toEqual(region!.sourceBox);
    expect(region!.orientation).toBe('horizontal');
    expect(region!.translatedText).toBe('');
    expect(region!.style).toEqual({
      fontFamily: 'Test Sans',
      color: '#000000',
      alignment: 'center',
      outline: { color: '#ffffff', widthPx: 2 },
    });
    expect(region!.version).toBe(1);
    expect(Object.isFrozen(region)).toBe(true);
    expect(Object.isFrozen(region!.editBox)).toBe(true);
  });

  it('moves the edit box without touching the source box', () => {
    const ledger = createLedger();
    ledger.seed([{ box: { x: 0, y: 0, width: 50, height: 50 }, text: 'x' }]);

    const updated = ledger.setEditBox('region-1', { x: 10, y: 10, width: 80, height: 60 });

    expect(updated.editBox).toEqual({ x: 10, y: 10, width: 80, height: 60 });
    expect(updated.sourceBox).toEqual({ x: 0, y: 0, width: 50, height: 50 });
    expect(updated.version).toBe(2);
    expect(ledger.resetEditBox('region-1').editBox).toEqual({ x: 0, y: 0, width: 50, height: 50 });
  });

  it('rejects boxes without positive area', () => {
    const ledger = createLedger();
    ledger.seed([{ box: { x: 0, y: 0, width: 50, height: 50 }, text: 'x' }]);

    expect(() => ledger.setEditBox('region-1', { x: 0, y: 0, width: 0, height: 10 })).toThrowError(
      TypesetError
    );
    let caught: unknown;
    try {
      ledger.setEditBox('region-1', { x: 0, y: 0, width: 10, height: -1 });
    } catch (error) {
      caught = error;
    }
    expect(caught instanceof TypesetError && caught.code).toBe(TypesetErrorCode.INVALID_BOX);
    expect(ledger.get('region-1')!.version).toBe(1);
  });

  it('caches plans until the region changes', () => {
    const ledger = createLedger();
    ledger.seed([{ box: { x: 0, y: 0, width: 200, height: 80 }, text: 'src' }]);
    ledger.setTranslatedText('region-1', 'HELLO THERE WORLD');

    const plan = ledger.getRenderPlan('region-1');
    expect(ledger.getRenderPlan('region-1')).toBe(plan);
    expect(plan.fontSize).toBe(29);
    expect(plan.version).toBe(2);
    expect(ledger.isCurrent(plan)).toBe(true);

    ledger.setTranslatedText('region-1', 'HI');
    expect(ledger.isCurrent(plan)).toBe(false);
    const next = ledger.getRenderPlan('region-1');
    expect(next).not.toBe(plan);
    expect(next.version).toBe(3);
    expect(next.lines.map((line) => line.text)).toEqual(['HI']);
  });

  it('hands out frozen plans that callers cannot corrupt', () => {
    const ledger = createLedger();
    ledger.seed([{ box: { x: 0, y: 0, width: 200, height: 80 }, text: 'src' }]);
    ledger.setTranslatedText('region-1', 'HELLO THERE WORLD');

    const plan = ledger.getRenderPlan('region-1');

    expect(Object.isFrozen(plan)).toBe(true);
    expect(Object.isFrozen(plan.lines)).toBe(true);
    expect(Object.isFrozen(plan.lines[0])).toBe(true);
    expect(Object.isFrozen(plan.innerBox)).toBe(true);
    expect(Object.isFrozen(plan.blockBox)).toBe(true);
    expect(() => {
      plan.lines.length = 0;
    }).toThrowError(TypeError);
    expect(ledger.getRenderPlan('region-1').lines).toHaveLength(2);
  });

  it('treats an unchanged translation as a no-op', () => {
    const ledger = createLedger();
    ledger.seed([{ box: { x: 0, y: 0, width: 100, height: 50 }, text: 'src' }]);
    ledger.setTranslatedText('region-1', 'SAME');
    const plan = ledger.getRenderPlan('region-1');

    const snapshot = ledger.setTranslatedText('region-1', 'SAME');

    expect(snapshot.version).toBe(2);
    expect(ledger.getRenderPlan('region-1')).toBe(plan);
  });

  it('keeps edits to different regions independent', () => {
    const ledger = createLedger();
    ledger.seed([
      { box: { x: 0, y: 0, width: 100, height: 50 }, text: 'a' },
      { box: { x: 0, y: 100, width: 100, height: 50 }, text: 'b' },
    ]);
    ledger.setTranslatedText('region-2', 'STEADY');
    const plan = ledger.getRenderPlan('region-2');

    ledger.setTranslatedText('region-1', 'CHANGED');
    ledger.setStyle('region-1', { alignment: 'left' });

    expect(ledger.get('region-2')!.version).toBe(2);
    expect(ledger.getRenderPlan('region-2')).toBe(plan);
    expect(ledger.get('region-1')!.version).toBe(3);
  });

  it('lets the last write to a region win', () => {
    const ledger = createLedger();
    ledger.seed([{ box: { x: 0, y: 0, width: 100, height: 50 }, text: 'a' }]);

    ledger.setTranslatedText('region-1', 'FIRST');
    ledger.setTranslatedText('region-1', 'SECOND');

    expect(ledger.getRenderPlan('region-1').text).toBe('SECOND');
  });

  it('re-plans when orientation or style changes', () => {
    const ledger = createLedger();
    ledger.seed([{ box: { x: 0, y: 0, width: 200, height: 80 }, text: 'a' }]);
    ledger.setTranslatedText('region-1', 'HELLO THERE WORLD');
    const before = ledger.getRenderPlan('region-1');

    ledger.setStyle('region-1', { fontSizeHint: 12 });
    const pinned = ledger.getRenderPlan('region-1');
    ledger.setOrientation('region-1', 'vertical');
    const vertical = ledger.getRenderPlan('region-1');

    expect(before.fontSize).toBe(29);
    expect(pinned.fontSize).toBe(12);
    expect(vertical.orientation).toBe('vertical');
    expect(vertical.version).toBe(4);
  });

  it('flags a degenerate region and still plans the others', () => {
    const ledger = createLedger({ innerPaddingPx: 20 });
    ledger.seed([
      { box: { x: 0, y: 0, width: 10, height: 10 }, text: 'a' },
      { box: { x: 50, y: 50, width: 200, height: 100 }, text: 'b' },
    ]);
    ledger.setTranslatedText('region-1', 'TINY');
    ledger.setTranslatedText('region-2', 'ROOMY');

    const plans = ledger.renderPlans();

    expect(plans.map((plan) => plan.status)).toEqual(['degenerate', 'ok']);
    expect(plans[0]!.issues).toEqual([TypesetErrorCode.DEGENERATE_BOX]);
    expect(plans[0]!.text).toBe('TINY');
    expect(plans.filter(isRenderable).map((plan) => plan.regionId)).toEqual(['region-2']);
  });

  it('warns about a missing font once per session', () => {
    const ledger = createLedger();
    ledger.seed([
      { box: { x: 0, y: 0, width: 100, height: 50 }, text: 'a', style: { fontFamily: 'Missing' } },
      { box: { x: 0, y: 60, width: 100, height: 50 }, text: 'b', style: { fontFamily: 'Missing' } },
    ]);
    ledger.setTranslatedText('region-1', 'ONE');
    ledger.setTranslatedText('region-2', 'TWO');

    const plans = ledger.renderPlans();
    ledger.setTranslatedText('region-1', 'THREE');
    ledger.getRenderPlan('region-1');

    const fontWarnings = warn.mock.calls.filter((call) => String(call[1]).startsWith('Font "Missing"'));
    expect(fontWarnings).toHaveLength(1);
    expect(plans.every((plan) => plan.fontFamily === 'Test Sans')).toBe(true);
    expect(plans.every((plan) => plan.issues.includes(TypesetErrorCode.UNKNOWN_FONT))).toBe(true);
  });

  it('throws for unknown ids and reports deletions', () => {
    const ledger = createLedger();
    const changes: LedgerChange[] = [];
    const unsubscribe = ledger.onChange((change) => changes.push(change));
    ledger.seed([{ box: { x: 0, y: 0, width: 100, height: 50 }, text: 'a' }]);
    ledger.setTranslatedText('region-1', 'HI');

    expect(ledger.delete('region-1')).toBe(true);
    expect(ledger.delete('region-1')).toBe(false);
    expect(() => ledger.getRenderPlan('region-1')).toThrowError(/does not exist/);
    unsubscribe();
    ledger.clear();

    expect(changes).toEqual([
      { type: 'seeded', ids: ['region-1'] },
      { type: 'updated', id: 'region-1', version: 2 },
      { type: 'deleted', id: 'region-1' },
    ]);
  });

  it('builds the mask from edit boxes', () => {
    const ledger = createLedger({ maskPaddingPx: 10, dilationPx: 0 });
    ledger.seed([
      { box: { x: 10, y: 10, width: 50, height: 50 }, text: 'a' },
      { box: { x: 55, y: 10, width: 50, height: 50 }, text: 'b' },
    ]);

    const merged = ledger.buildMask({ width: 200, height: 100 });
    expect(merged.components).toHaveLength(1);
    expect(merged.components[0]!.bounds).toEqual({ x: 0, y: 0, width: 115, height: 70 });

    ledger.setEditBox('region-2', { x: 150, y: 10, width: 30, height: 30 });
    expect(ledger.buildMask({ width: 200, height: 100 }).components).toHaveLength(2);
  });
});
