export * from './types/geometry';
export * from './types/metrics';
export * from './types/region';
export * from './types/collaborators';
export * from './types/typeset-errors';
export { ApproximateMetricsProvider, LINE_GAP_RATIO } from './metrics/approximate-metrics';
export { CanvasMetricsProvider, registerFonts, type FontAsset } from './metrics/canvas-metrics';
export { breakLines, measureRun, type LineBreakInput, type LineBreakResult } from './typeset/line-breaker';
export { solveFit, innerBoxOf, type FitInput, type FitResult } from './typeset/fit-solver';
export { placeLines, type PlacementInput, type PlacementResult } from './typeset/placement';
export { computeRenderPlan, isRenderable } from './typeset/render-plan';
export {
  buildMask,
  dilateMask,
  findComponents,
  countMaskPixels,
  type MaskBox,
  type MaskComponent,
  type MaskInput,
  type MaskResult,
} from './typeset/mask';
export { encodeMaskPng, maskToRaster } from './typeset/mask-image';
export { RegionLedger, type LedgerChange, type RegionSeed } from './typeset/region-ledger';
export { groupDetections } from './typeset/regions';
export {
  runTypesetPipeline,
  type PipelineIssue,
  type TypesetPipelineInput,
  type TypesetPipelineOptions,
  type TypesetPipelineOutput,
} from './typeset/index';
export {
  resolveEngineConfig,
  DEFAULT_ENGINE_CONFIG,
  type EngineConfig,
  type EngineConfigInput,
} from './utils/config';
export { formatErrorMessage, ERROR_MESSAGES } from './utils/error-handling';
export { normalizeTranslatedText } from './utils/text-normalize';
