/**
 * Color conversion between `#rrggbb` strings and `[R, G, B]` triples
 *
 * Color selector widgets hand back RGB triples while the stored entry and
 * the rewritten markup use hex strings. Both directions round-trip:
 *
 * ```typescript
 * rgbToHex([24, 188, 242]); // => "#18bcf2"
 * hexToRgb('#18BCF2');      // => [24, 188, 242]
 * ```
 */

import type { RgbColor } from '@branding/types';

const HEX_COLOR_RE = /^#[0-9a-fA-F]{6}$/;

/**
 * Check whether a value is a `#RRGGBB` color string (either case)
 */
export function isHexColor(value: unknown): value is string {
  return typeof value === 'string' && HEX_COLOR_RE.test(value);
}

/**
 * Check whether a value is a `[R, G, B]` triple of integers in 0-255
 */
export function isRgbColor(value: unknown): value is RgbColor {
  return (
    Array.isArray(value) &&
    value.length === 3 &&
    value.every((c) => typeof c === 'number' && Number.isInteger(c) && c >= 0 && c <= 255)
  );
}

/**
 * Convert an RGB triple to a lower-case `#rrggbb` string
 *
 * @throws RangeError if any component is not an integer in 0-255
 */
export function rgbToHex(rgb: RgbColor): string {
  if (!isRgbColor(rgb)) {
    throw new RangeError(`Invalid RGB color: ${JSON.stringify(rgb)}`);
  }
  return '#' + rgb.map((c) => c.toString(16).padStart(2, '0')).join('');
}

/**
 * Convert a `#RRGGBB` string (either case) to an RGB triple
 *
 * @throws RangeError if the string is not a 6-digit hex color
 */
export function hexToRgb(hex: string): RgbColor {
  if (!isHexColor(hex)) {
    throw new RangeError(`Invalid hex color: ${hex}`);
  }
  return [
    parseInt(hex.slice(1, 3), 16),
    parseInt(hex.slice(3, 5), 16),
    parseInt(hex.slice(5, 7), 16),
  ];
}
