export interface Bbox {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface RasterImage {
  width: number;
  height: number;
  /** RGBA, row-major, 4 bytes per pixel. */
  data: Uint8ClampedArray;
}
