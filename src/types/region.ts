import type { Bbox } from './geometry';
import type { TypesetErrorCode } from './typeset-errors';

export type Orientation = 'horizontal' | 'vertical';
export type Alignment = 'left' | 'center' | 'right';

export interface OutlineStyle {
  color: string;
  widthPx: number;
}

export interface RegionStyle {
  fontFamily: string;
  fontSizeHint?: number;
  color: string;
  alignment: Alignment;
  outline?: OutlineStyle;
}

export interface Region {
  id: string;
  sourceBox: Bbox;
  editBox: Bbox;
  sourceText: string;
  translatedText: string;
  orientation: Orientation;
  style: RegionStyle;
}

export interface RegionSnapshot extends Readonly<Region> {
  readonly version: number;
}

export interface LaidOutLine {
  text: string;
  /** Length along the reading direction (width for rows, height for columns). */
  extent: number;
  /** Size across the reading direction (height for rows, width for columns). */
  thickness: number;
  /** The token alone is longer than the available extent. */
  overflow: boolean;
}

export interface PlacedLine extends LaidOutLine {
  /** Top-left corner of the line box in image pixels. */
  x: number;
  y: number;
}

export type RenderPlanStatus = 'ok' | 'overflow' | 'degenerate' | 'empty';

export interface RenderPlan {
  regionId: string;
  /** Region version the plan was computed from. */
  version: number;
  status: RenderPlanStatus;
  overflow: boolean;
  pinnedSizeRejected: boolean;
  hadForcedBreak: boolean;
  text: string;
  orientation: Orientation;
  style: RegionStyle;
  fontFamily: string;
  fontSize: number;
  lineGap: number;
  lines: PlacedLine[];
  /** editBox minus the inner padding; may have non-positive size when degenerate. */
  innerBox: Bbox;
  /** Bounds of the placed line block; zero-sized when nothing is placed. */
  blockBox: Bbox;
  /** Requested family that was replaced by the default family, if any. */
  fontFallbackFrom: string | null;
  issues: TypesetErrorCode[];
}
