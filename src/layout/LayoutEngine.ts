/**
 * Region layout for the presentation screen.
 *
 * All values are in character cells. The screen is split into four stacked
 * regions:
 *   - background: covers the whole screen, lowest in the stack
 *   - header:     one bordered row at the top (3 rows including its border)
 *   - body:       inset from the left, below the header
 *   - footer:     one borderless row on the last screen row
 */

export type BorderStyle = 'none' | 'rounded' | 'blank';

export type RegionName = 'background' | 'header' | 'body' | 'footer';

export const REGION_NAMES: readonly RegionName[] = ['background', 'header', 'body', 'footer'];

export interface Region {
  width: number;
  height: number;
  row: number;
  col: number;
  zIndex: number;
  border: BorderStyle;
}

export type RegionLayout = Record<RegionName, Region>;

/** Header content row plus its top and bottom border. */
export const HEADER_HEIGHT = 1 + 2;
export const FOOTER_HEIGHT = 1;
/** Rows kept free around the body for its own border and spacing. */
export const BORDER_RESERVE = 2 + 1;
export const BODY_INSET = 8;
export const BODY_ROW = 4;

export const Z_BACKGROUND = 1;
export const Z_BODY = 2;
export const Z_OVERLAY = 3;

function normalizeDimension(value: number): number {
  if (!Number.isFinite(value) || value < 0) return 0;
  return Math.floor(value);
}

export function computeBodyHeight(screenHeight: number): number {
  const height = normalizeDimension(screenHeight);
  return Math.max(0, height - HEADER_HEIGHT - FOOTER_HEIGHT - BORDER_RESERVE);
}

export function computeRegions(screenWidth: number, screenHeight: number): RegionLayout {
  const width = normalizeDimension(screenWidth);
  const height = normalizeDimension(screenHeight);

  return {
    background: {
      width,
      height,
      row: 0,
      col: 1,
      zIndex: Z_BACKGROUND,
      border: 'none',
    },
    header: {
      width,
      height: 1,
      row: 0,
      col: 1,
      zIndex: Z_OVERLAY,
      border: 'rounded',
    },
    body: {
      width: Math.max(0, width - BODY_INSET),
      height: computeBodyHeight(height),
      row: BODY_ROW,
      col: BODY_INSET,
      zIndex: Z_BODY,
      border: 'blank',
    },
    footer: {
      width,
      height: 1,
      row: Math.max(0, height - 1),
      col: 1,
      zIndex: Z_OVERLAY,
      border: 'none',
    },
  };
}
