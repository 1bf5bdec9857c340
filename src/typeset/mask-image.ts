import { createCanvas } from '@napi-rs/canvas';
import type { RasterImage } from '@/types/geometry';
import type { MaskResult } from './mask';

/** Expands the single-channel mask to opaque greyscale RGBA. */
export const maskToRaster = (mask: MaskResult): RasterImage => {
  const data = new Uint8ClampedArray(mask.width * mask.height * 4);
  for (let i = 0; i < mask.data.length; i += 1) {
    const value = mask.data[i] ?? 0;
    const idx = i * 4;
    data[idx] = value;
    data[idx + 1] = value;
    data[idx + 2] = value;
    data[idx + 3] = 255;
  }
  return { width: mask.width, height: mask.height, data };
};

export const encodeMaskPng = (mask: MaskResult): Buffer => {
  const canvas = createCanvas(mask.width, mask.height);
  const context = canvas.getContext('2d');
  const image = context.createImageData(mask.width, mask.height);
  image.data.set(maskToRaster(mask).data);
  context.putImageData(image, 0, 0);
  return canvas.toBuffer('image/png');
};
