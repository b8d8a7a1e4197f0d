import { describe, it, expect } from 'vitest';
import { rgbToHex, hexToRgb, isHexColor, isRgbColor } from '../src/color.js';
import type { RgbColor } from '@branding/types';

describe('color.ts', () => {
  describe('rgbToHex', () => {
    it('should convert a triple to lower-case hex', () => {
      expect(rgbToHex([24, 188, 242])).toBe('#18bcf2');
    });

    it('should zero-pad single-digit components', () => {
      expect(rgbToHex([0, 5, 15])).toBe('#00050f');
    });

    it('should handle the extremes', () => {
      expect(rgbToHex([0, 0, 0])).toBe('#000000');
      expect(rgbToHex([255, 255, 255])).toBe('#ffffff');
    });

    it('should reject out-of-range components', () => {
      expect(() => rgbToHex([256, 0, 0])).toThrow(RangeError);
      expect(() => rgbToHex([-1, 0, 0])).toThrow(RangeError);
    });

    it('should reject non-integer components', () => {
      expect(() => rgbToHex([1.5, 0, 0])).toThrow('Invalid RGB color: [1.5,0,0]');
    });
  });

  describe('hexToRgb', () => {
    it('should convert upper-case hex', () => {
      expect(hexToRgb('#18BCF2')).toEqual([24, 188, 242]);
    });

    it('should convert lower-case hex', () => {
      expect(hexToRgb('#ff0000')).toEqual([255, 0, 0]);
    });

    it('should reject malformed strings', () => {
      expect(() => hexToRgb('18BCF2')).toThrow(RangeError);
      expect(() => hexToRgb('#18BCF')).toThrow(RangeError);
      expect(() => hexToRgb('#GGGGGG')).toThrow('Invalid hex color: #GGGGGG');
    });
  });

  describe('round trips', () => {
    it('should return the original triple after rgb -> hex -> rgb', () => {
      const samples: RgbColor[] = [
        [0, 0, 0],
        [255, 255, 255],
        [24, 188, 242],
        [1, 128, 254],
        [17, 34, 51],
      ];
      for (const rgb of samples) {
        expect(hexToRgb(rgbToHex(rgb))).toEqual(rgb);
      }
    });

    it('should return the lower-cased hex after hex -> rgb -> hex', () => {
      for (const hex of ['#18BCF2', '#abcdef', '#A0b1C2', '#000000', '#FFFFFF']) {
        expect(rgbToHex(hexToRgb(hex))).toBe(hex.toLowerCase());
      }
    });
  });

  describe('guards', () => {
    it('should recognise hex colors', () => {
      expect(isHexColor('#18BCF2')).toBe(true);
      expect(isHexColor('#18BCF2 ')).toBe(false);
      expect(isHexColor(24)).toBe(false);
    });

    it('should recognise rgb triples', () => {
      expect(isRgbColor([24, 188, 242])).toBe(true);
      expect(isRgbColor([24, 188])).toBe(false);
      expect(isRgbColor(['24', 188, 242])).toBe(false);
    });
  });
});
