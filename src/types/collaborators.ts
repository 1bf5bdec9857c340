import type { Bbox, RasterImage } from './geometry';
import type { Orientation, RenderPlan } from './region';
import type { MaskResult } from '@/typeset/mask';

export interface DetectedBlock {
  box: Bbox;
  text: string;
  orientation?: Orientation;
}

export interface TextDetector {
  detect(image: RasterImage): Promise<DetectedBlock[]>;
}

export interface TranslationRequest {
  from: string;
  to: string;
  text: string;
}

export interface TranslationResponse {
  text: string;
}

export interface TextTranslator {
  translate(request: TranslationRequest): Promise<TranslationResponse>;
}

export interface Inpainter {
  inpaint(image: RasterImage, mask: MaskResult): Promise<RasterImage>;
}

export interface TextRenderer {
  render(image: RasterImage, plans: RenderPlan[]): Promise<RasterImage>;
}
