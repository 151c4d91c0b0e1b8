export interface Point {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

export interface Rect extends Point, Size {}

/**
 * Image shown on a bitmap button.
 */
export interface ButtonBitmap {
  src: string;
  width: number;
  height: number;
  alt?: string;
}
