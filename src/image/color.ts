/**
 * Colors are packed 24-bit RGB integers (0xRRGGBB). Alpha never reaches the
 * recognizer; decoded images are flattened against the background first.
 */

export type Color = number;

export const WHITE: Color = 0xffffff;
export const BLACK: Color = 0x000000;

const NAMED_COLORS: Record<string, Color> = {
  white: WHITE,
  black: BLACK,
};

export function isColor(value: unknown): value is Color {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 0xffffff;
}

export function rgb(r: number, g: number, b: number): Color {
  return ((r & 0xff) << 16) | ((g & 0xff) << 8) | (b & 0xff);
}

export function channels(color: Color): [number, number, number] {
  return [(color >> 16) & 0xff, (color >> 8) & 0xff, color & 0xff];
}

/**
 * Parse `#rgb`, `#rrggbb`, `0xrrggbb` or a named color.
 * Returns undefined when the text is not a color.
 */
export function parseColor(text: string): Color | undefined {
  const value = text.trim().toLowerCase();
  if (value in NAMED_COLORS) return NAMED_COLORS[value];

  const short = /^#([0-9a-f])([0-9a-f])([0-9a-f])$/.exec(value);
  if (short) {
    return parseInt(short[1] + short[1] + short[2] + short[2] + short[3] + short[3], 16);
  }

  const long = /^(?:#|0x)([0-9a-f]{6})$/.exec(value);
  if (long) return parseInt(long[1], 16);

  return undefined;
}

export function formatColor(color: Color): string {
  return `#${color.toString(16).padStart(6, '0')}`;
}

/**
 * A pixel is ink when it differs from the background. With a tolerance,
 * the largest per-channel difference must exceed it.
 */
export function isInk(color: Color, background: Color, tolerance = 0): boolean {
  if (tolerance <= 0) return color !== background;
  const [r1, g1, b1] = channels(color);
  const [r2, g2, b2] = channels(background);
  return Math.max(Math.abs(r1 - r2), Math.abs(g1 - g2), Math.abs(b1 - b2)) > tolerance;
}
