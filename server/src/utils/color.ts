export interface Rgb {
  r: number;
  g: number;
  b: number;
}

// Parse a #rrggbb string; anything else reads as black
export function parseHexColor(hex: string): Rgb {
  const match = /^#?([0-9a-f]{6})$/i.exec(hex);
  if (!match) {
    return { r: 0, g: 0, b: 0 };
  }
  const value = Number.parseInt(match[1], 16);
  return { r: (value >> 16) & 0xff, g: (value >> 8) & 0xff, b: value & 0xff };
}

// Halve every channel (disabled buttons)
export function dim(color: Rgb): Rgb {
  return { r: color.r >> 1, g: color.g >> 1, b: color.b >> 1 };
}

// Mix `top` over `base` with 0-255 coverage
export function blend(base: Rgb, top: Rgb, coverage: number): Rgb {
  const mix = (a: number, b: number) => Math.round((b * coverage + a * (255 - coverage)) / 255);
  return { r: mix(base.r, top.r), g: mix(base.g, top.g), b: mix(base.b, top.b) };
}
