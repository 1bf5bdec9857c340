export interface TextMetrics {
  width: number;
  height: number;
  lineGap: number;
  /** Family the measurement was actually taken with. */
  fontFamily: string;
  /** True when the requested family was unknown and the default was used instead. */
  fallback: boolean;
}

/**
 * The only capability the layout code needs from a font backend. Any
 * implementation must be deterministic for a given font asset and must not
 * depend on the state of a drawing surface.
 */
export interface MetricsProvider {
  measure(fontFamily: string, fontSizePx: number, text: string): TextMetrics;
}
