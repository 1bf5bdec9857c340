import type { RasterImage } from '@/types/geometry';
import type {
  DetectedBlock,
  Inpainter,
  TextDetector,
  TextRenderer,
  TextTranslator,
} from '@/types/collaborators';
import type { RenderPlan } from '@/types/region';
import { TypesetErrorCode } from '@/types/typeset-errors';
import {
  ERROR_MESSAGES,
  createCollaboratorError,
  formatErrorMessage,
  retryWithBackoff,
} from '@/utils/error-handling';
import { logError, logInfo, logWarning } from '@/utils/logging';
import type { MaskResult } from './mask';
import type { RegionLedger } from './region-ledger';
import { groupDetections } from './regions';
import { isRenderable } from './render-plan';

export type PipelineStep = 'detect' | 'translate' | 'mask' | 'inpaint' | 'layout' | 'render';

export interface PipelineIssue {
  step: PipelineStep;
  code: TypesetErrorCode;
  message: string;
  regionId?: string;
}

export interface TypesetPipelineInput {
  image: RasterImage;
  from: string;
  to: string;
  detector: TextDetector;
  translator: TextTranslator;
  inpainter: Inpainter;
  renderer: TextRenderer;
}

export interface TypesetPipelineOptions {
  /** Merge vertically stacked detector blocks into one region. Defaults to true. */
  groupBlocks?: boolean;
  retryDelaysMs?: number[];
}

export interface TypesetPipelineOutput {
  image: RasterImage;
  background: RasterImage;
  mask: MaskResult;
  plans: RenderPlan[];
  issues: PipelineIssue[];
}

const hasArea = (block: DetectedBlock): boolean => block.box.width > 0 && block.box.height > 0;

const planIssues = (plan: RenderPlan): PipelineIssue[] =>
  plan.issues.map((code): PipelineIssue => ({
    step: 'layout',
    code,
    message: ERROR_MESSAGES[code].message,
    regionId: plan.regionId,
  }));

/**
 * Runs one page through detect → translate → mask → inpaint → render,
 * replacing whatever the ledger held before. A region whose translation fails
 * keeps an empty translation and is reported; the rest of the page proceeds.
 */
export const runTypesetPipeline = async (
  ledger: RegionLedger,
  input: TypesetPipelineInput,
  options: TypesetPipelineOptions = {}
): Promise<TypesetPipelineOutput> => {
  const issues: PipelineIssue[] = [];
  const recordFailure = (step: PipelineStep, error: unknown, regionId?: string): void => {
    logError(error, regionId ? `${step} failed for ${regionId}` : `${step} failed`);
    const formatted = formatErrorMessage(error);
    issues.push({ step, code: formatted.code, message: formatted.message, regionId });
  };

  let blocks: DetectedBlock[];
  try {
    blocks = await input.detector.detect(input.image);
  } catch (error) {
    throw createCollaboratorError('Text detection', error);
  }

  ledger.clear();
  const usable = blocks.filter(hasArea);
  const seeds =
    options.groupBlocks === false ? usable : groupDetections(usable, ledger.config.groupingGapPx);
  const regions = ledger.seed(seeds);
  logInfo('Seeded regions.', { detected: blocks.length, regions: regions.length });

  const translations = await Promise.allSettled(
    regions.map(async (region) => {
      const text = region.sourceText.trim();
      if (!text) return;
      const response = await retryWithBackoff(
        () => input.translator.translate({ from: input.from, to: input.to, text }),
        {
          delaysMs: options.retryDelaysMs,
          onRetry: (error, attempt) =>
            logWarning('Retrying translation.', { id: region.id, attempt, error }),
        }
      );
      if (ledger.has(region.id)) {
        ledger.setTranslatedText(region.id, response.text);
      }
    })
  );
  translations.forEach((result, index) => {
    if (result.status === 'rejected') {
      recordFailure(
        'translate',
        createCollaboratorError('Translation', result.reason),
        regions[index]?.id
      );
    }
  });

  const mask = ledger.buildMask(input.image);
  for (const skip of mask.skipped) {
    issues.push({
      step: 'mask',
      code: skip.code,
      message: ERROR_MESSAGES[skip.code].message,
      regionId: skip.id,
    });
  }

  let background = input.image;
  try {
    background = await input.inpainter.inpaint(input.image, mask);
  } catch (error) {
    recordFailure('inpaint', createCollaboratorError('Inpainting', error));
  }

  const plans = ledger.renderPlans();
  issues.push(...plans.flatMap(planIssues));

  let image = background;
  try {
    image = await input.renderer.render(background, plans.filter(isRenderable));
  } catch (error) {
    recordFailure('render', createCollaboratorError('Rendering', error));
  }

  return { image, background, mask, plans, issues };
};
