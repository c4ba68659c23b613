/*
 * Copyright (c) 2026 Certinia Inc. All rights reserved.
 */

/**
 * ColorUtils
 *
 * Color math for event fills. All colors are numeric hex values (0xRRGGBB), the same
 * format renderers hand to the GPU.
 */

const LABEL_HASH_MULTIPLIER = 0x517cc1b727220a95n;

/**
 * Pack unit-range channels into 0xRRGGBB. Channels are clamped to [0, 1].
 */
export function rgbToHex(r: number, g: number, b: number): number {
  return (toByte(r) << 16) | (toByte(g) << 8) | toByte(b);
}

/**
 * Convert HSL to a hex color.
 *
 * @param h - Hue in degrees, [0, 360)
 * @param s - Saturation, [0, 1]
 * @param l - Lightness, [0, 1]
 */
export function hslToHex(h: number, s: number, l: number): number {
  const c = (1 - Math.abs(2 * l - 1)) * s;
  const hPrime = (h / 60) % 6;
  const x = c * (1 - Math.abs((hPrime % 2) - 1));

  let r1: number;
  let g1: number;
  let b1: number;
  if (hPrime >= 0 && hPrime < 1) {
    [r1, g1, b1] = [c, x, 0];
  } else if (hPrime >= 1 && hPrime < 2) {
    [r1, g1, b1] = [x, c, 0];
  } else if (hPrime >= 2 && hPrime < 3) {
    [r1, g1, b1] = [0, c, x];
  } else if (hPrime >= 3 && hPrime < 4) {
    [r1, g1, b1] = [0, x, c];
  } else if (hPrime >= 4 && hPrime < 5) {
    [r1, g1, b1] = [x, 0, c];
  } else {
    [r1, g1, b1] = [c, 0, x];
  }

  const m = l - c / 2;
  return rgbToHex(r1 + m, g1 + m, b1 + m);
}

/**
 * Stable pastel color derived from a label, used when coloring by event name rather
 * than by kind. Each channel lands in [0.6, 0.9].
 */
export function colorFromLabel(label: string): number {
  let hash = 0n;
  for (const char of label) {
    hash = BigInt.asUintN(64, hash + BigInt(char.codePointAt(0) ?? 0));
    hash = BigInt.asUintN(64, hash * LABEL_HASH_MULTIPLIER);
  }

  const r = Number((hash >> 16n) & 0xffn) / 255;
  const g = Number((hash >> 8n) & 0xffn) / 255;
  const b = Number(hash & 0xffn) / 255;
  return rgbToHex(0.6 + r * 0.3, 0.6 + g * 0.3, 0.6 + b * 0.3);
}

/**
 * Format a hex color as `#rrggbb`.
 */
export function hexToCss(color: number): string {
  return `#${(color & 0xffffff).toString(16).padStart(6, '0')}`;
}

function toByte(channel: number): number {
  return Math.round(Math.min(1, Math.max(0, channel)) * 255);
}
