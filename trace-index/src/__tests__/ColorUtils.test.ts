/*
 * Copyright (c) 2026 Certinia Inc. All rights reserved.
 */

import { colorFromLabel, hexToCss, hslToHex, rgbToHex } from '../ColorUtils.js';

describe('ColorUtils', () => {
  describe('rgbToHex', () => {
    it('should pack unit channels into 0xRRGGBB', () => {
      expect(rgbToHex(1, 0, 0)).toBe(0xff0000);
      expect(rgbToHex(0, 1, 0)).toBe(0x00ff00);
      expect(rgbToHex(0.85, 0.87, 0.9)).toBe(0xd9dee6);
    });

    it('should clamp out-of-range channels', () => {
      expect(rgbToHex(2, -1, 0.5)).toBe(0xff0080);
    });
  });

  describe('hslToHex', () => {
    it('should convert pastel hues', () => {
      expect(hslToHex(120, 0.35, 0.8)).toBe(0xbadeba);
      expect(hslToHex(240, 0.35, 0.8)).toBe(0xbabade);
      expect(hslToHex(0, 0.35, 0.8)).toBe(0xdebaba);
      expect(hslToHex(300, 0.35, 0.8)).toBe(0xdebade);
    });

    it('should produce gray without saturation', () => {
      expect(hslToHex(0, 0, 0.85)).toBe(0xd9d9d9);
    });
  });

  describe('colorFromLabel', () => {
    it('should be stable for the same label', () => {
      expect(colorFromLabel('main')).toBe(colorFromLabel('main'));
      expect(colorFromLabel('main')).toBe(0xada1d8);
      expect(colorFromLabel('render')).toBe(0xc9a2cf);
    });

    it('should keep every channel in the pastel band', () => {
      for (const label of ['a', 'main', 'render', 'Thread 12', 'x'.repeat(40)]) {
        const color = colorFromLabel(label);
        for (const channel of [(color >> 16) & 0xff, (color >> 8) & 0xff, color & 0xff]) {
          expect(channel).toBeGreaterThanOrEqual(153);
          expect(channel).toBeLessThanOrEqual(230);
        }
      }
    });

    it('should use the band floor for an empty label', () => {
      expect(colorFromLabel('')).toBe(0x999999);
    });
  });

  describe('hexToCss', () => {
    it('should format with six lowercase digits', () => {
      expect(hexToCss(0xbadeba)).toBe('#badeba');
      expect(hexToCss(0x0000ff)).toBe('#0000ff');
    });
  });
});
