import type { MetricsProvider } from '@/types/metrics';
import type { RegionSnapshot, RenderPlan } from '@/types/region';
import type { EngineConfig } from '@/utils/config';
import { solveFit } from './fit-solver';
import { placeLines } from './placement';

/** Fit and place one region. Pure: reads only the snapshot it is given. */
export const computeRenderPlan = (
  region: RegionSnapshot,
  config: EngineConfig,
  metrics: MetricsProvider
): RenderPlan => {
  const fit = solveFit({
    text: region.translatedText,
    box: region.editBox,
    orientation: region.orientation,
    style: region.style,
    fontRange: config.fontRange,
    innerPaddingPx: config.innerPaddingPx,
    metrics,
  });
  const placement = placeLines({
    lines: fit.lines,
    lineGap: fit.lineGap,
    innerBox: fit.innerBox,
    alignment: region.style.alignment,
    orientation: region.orientation,
  });

  return {
    regionId: region.id,
    version: region.version,
    status: fit.status,
    overflow: fit.overflow,
    pinnedSizeRejected: fit.pinnedSizeRejected,
    hadForcedBreak: fit.hadForcedBreak,
    text: fit.text,
    orientation: region.orientation,
    style: region.style,
    fontFamily: fit.fontFamily,
    fontSize: fit.fontSize,
    lineGap: fit.lineGap,
    lines: placement.lines,
    innerBox: fit.innerBox,
    blockBox: placement.blockBox,
    fontFallbackFrom: fit.fontFallbackFrom,
    issues: fit.issues,
  };
};

/** Plans the renderer should draw: degenerate and empty plans carry nothing to paint. */
export const isRenderable = (plan: RenderPlan): boolean =>
  plan.status === 'ok' || plan.status === 'overflow';
