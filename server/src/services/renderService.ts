import * as crypto from 'crypto';
import * as path from 'path';
import Jimp from 'jimp';
import { Button, DEFAULT_FONT_SIZE } from '../db';
import { Rgb, blend, dim, parseHexColor } from '../utils/color';
import { DeviceGeometry } from './deviceService';

const readImage = (file: string) => Jimp.read(file);
const loadFont = (file: string) => Jimp.loadFont(file);
type JimpImage = Awaited<ReturnType<typeof readImage>>;
type Font = Awaited<ReturnType<typeof loadFont>>;

export type RenderGeometry = Pick<
  DeviceGeometry,
  'keySize' | 'imageFormat' | 'rotation' | 'flipHorizontal' | 'flipVertical'
>;

export interface PageColors {
  backgroundColor: string;
  textColor: string;
}

// Encoded key image plus the content hash it was drawn from
export interface RenderedBitmap {
  readonly hash: string;
  readonly data: Buffer;
}

export interface RenderStats {
  hits: number;
  misses: number;
  size: number;
  maxEntries: number;
}

export interface RenderCacheOptions {
  geometry: RenderGeometry;
  maxEntries?: number;
  iconsDir?: string;
}

// Space kept clear around the label, in pixels
export const TEXT_MARGIN = 4;

// Bundled bitmap font sizes, largest first
export const FONT_STEPS = [64, 32, 16, 14, 12, 10, 8] as const;

const FONT_FILES: Record<typeof FONT_STEPS[number], string> = {
  64: Jimp.FONT_SANS_64_BLACK,
  32: Jimp.FONT_SANS_32_BLACK,
  16: Jimp.FONT_SANS_16_BLACK,
  14: Jimp.FONT_SANS_14_BLACK,
  12: Jimp.FONT_SANS_12_BLACK,
  10: Jimp.FONT_SANS_10_BLACK,
  8: Jimp.FONT_SANS_8_BLACK
};

const fonts = new Map<number, Promise<Font>>();

function fontFor(size: typeof FONT_STEPS[number]): Promise<Font> {
  let font = fonts.get(size);
  if (!font) {
    font = loadFont(FONT_FILES[size]);
    fonts.set(size, font);
  }
  return font;
}

/**
 * Pick the font step for a label: start at the largest step not above
 * `fontSize` and shrink until the text box fits. Falls back to the smallest
 * step when nothing fits.
 */
export function fitFontSize(
  fontSize: number,
  box: { width: number; height: number },
  measure: (step: typeof FONT_STEPS[number]) => { width: number; height: number }
): typeof FONT_STEPS[number] {
  const smallest = FONT_STEPS[FONT_STEPS.length - 1];
  for (const step of FONT_STEPS) {
    if (step > fontSize) continue;
    const size = measure(step);
    if (size.width <= box.width && size.height <= box.height) {
      return step;
    }
  }
  return smallest;
}

// Hex digest over everything that changes how a button looks
export function contentHash(button: Pick<Button, 'label' | 'fontSize' | 'icon' | 'enabled'>, colors: PageColors): string {
  const visual = [
    button.label,
    colors.backgroundColor,
    colors.textColor,
    button.fontSize,
    button.icon ?? null,
    button.enabled
  ];
  return crypto.createHash('sha256').update(JSON.stringify(visual)).digest('hex');
}

// Effective colors: button override, else page default
export function effectiveColors(button: Pick<Button, 'backgroundColor' | 'textColor'>, page: PageColors): PageColors {
  return {
    backgroundColor: button.backgroundColor ?? page.backgroundColor,
    textColor: button.textColor ?? page.textColor
  };
}

// What an empty slot shows
export function blankButton(slot: number): Button {
  return { slot, label: '', fontSize: DEFAULT_FONT_SIZE, enabled: true, action: { type: 'none' } };
}

function fill(image: JimpImage, color: Rgb): void {
  const data = image.bitmap.data;
  for (let i = 0; i < data.length; i += 4) {
    data[i] = color.r;
    data[i + 1] = color.g;
    data[i + 2] = color.b;
    data[i + 3] = 255;
  }
}

// Tint the coverage of a glyph layer with `color` and mix it into `image`
function tintInto(image: JimpImage, layer: JimpImage, color: Rgb): void {
  const target = image.bitmap.data;
  const source = layer.bitmap.data;
  for (let i = 0; i < target.length; i += 4) {
    const coverage = source[i + 3];
    if (coverage === 0) continue;
    const mixed = blend({ r: target[i], g: target[i + 1], b: target[i + 2] }, color, coverage);
    target[i] = mixed.r;
    target[i + 1] = mixed.g;
    target[i + 2] = mixed.b;
  }
}

function stripAlpha(image: JimpImage): Buffer {
  const rgba = image.bitmap.data;
  const rgb = Buffer.alloc((rgba.length / 4) * 3);
  for (let i = 0, j = 0; i < rgba.length; i += 4, j += 3) {
    rgb[j] = rgba[i];
    rgb[j + 1] = rgba[i + 1];
    rgb[j + 2] = rgba[i + 2];
  }
  return rgb;
}

async function encode(image: JimpImage, geometry: RenderGeometry): Promise<Buffer> {
  if (geometry.rotation !== 0) {
    image.rotate(geometry.rotation, false);
  }
  if (geometry.flipHorizontal || geometry.flipVertical) {
    image.flip(geometry.flipHorizontal, geometry.flipVertical);
  }
  switch (geometry.imageFormat) {
    case 'jpeg':
      return image.quality(90).getBufferAsync(Jimp.MIME_JPEG);
    case 'bmp':
      return image.getBufferAsync(Jimp.MIME_BMP);
    case 'rgb':
      return stripAlpha(image);
  }
}

/**
 * Button → key image, memoized by content hash in a bounded LRU.
 *
 * Rendering is a pure function of the visual inputs and the device
 * geometry; `configure` drops every entry when the geometry changes.
 */
export class RenderCache {
  private geometry: RenderGeometry;
  private readonly maxEntries: number;
  private readonly iconsDir: string | null;
  private entries = new Map<string, RenderedBitmap>();
  private pending = new Map<string, Promise<RenderedBitmap>>();
  private generation = 0;
  private hits = 0;
  private misses = 0;

  constructor(options: RenderCacheOptions) {
    this.geometry = { ...options.geometry };
    this.maxEntries = options.maxEntries ?? 256;
    this.iconsDir = options.iconsDir ? path.resolve(options.iconsDir) : null;
  }

  async render(button: Button, pageColors: PageColors): Promise<RenderedBitmap> {
    const colors = effectiveColors(button, pageColors);
    const hash = contentHash(button, colors);

    const cached = this.entries.get(hash);
    if (cached) {
      this.hits++;
      // Re-insert to mark as most recently used
      this.entries.delete(hash);
      this.entries.set(hash, cached);
      return cached;
    }

    const inFlight = this.pending.get(hash);
    if (inFlight) {
      this.hits++;
      return inFlight;
    }

    this.misses++;
    const generation = this.generation;
    const geometry = { ...this.geometry };
    const rendering = this.draw(button, colors, geometry)
      .then(data => {
        const bitmap: RenderedBitmap = { hash, data };
        if (generation === this.generation) {
          this.insert(bitmap);
        }
        return bitmap;
      })
      .finally(() => {
        if (this.pending.get(hash) === rendering) {
          this.pending.delete(hash);
        }
      });
    this.pending.set(hash, rendering);
    return rendering;
  }

  // Hash a button would render under, without drawing it
  hashFor(button: Button, pageColors: PageColors): string {
    return contentHash(button, effectiveColors(button, pageColors));
  }

  has(hash: string): boolean {
    return this.entries.has(hash);
  }

  // Drop entries no live button references; returns how many were dropped
  prune(liveHashes: Iterable<string>): number {
    const live = new Set(liveHashes);
    let dropped = 0;
    for (const hash of [...this.entries.keys()]) {
      if (!live.has(hash)) {
        this.entries.delete(hash);
        dropped++;
      }
    }
    return dropped;
  }

  configure(geometry: RenderGeometry): void {
    const changed =
      geometry.keySize !== this.geometry.keySize ||
      geometry.imageFormat !== this.geometry.imageFormat ||
      geometry.rotation !== this.geometry.rotation ||
      geometry.flipHorizontal !== this.geometry.flipHorizontal ||
      geometry.flipVertical !== this.geometry.flipVertical;
    if (!changed) return;

    this.geometry = { ...geometry };
    this.clear();
    console.log(`[Render] Geometry changed to ${geometry.keySize}px ${geometry.imageFormat}, cache cleared`);
  }

  clear(): void {
    this.generation++;
    this.entries.clear();
    this.pending.clear();
  }

  stats(): RenderStats {
    return { hits: this.hits, misses: this.misses, size: this.entries.size, maxEntries: this.maxEntries };
  }

  private insert(bitmap: RenderedBitmap): void {
    this.entries.set(bitmap.hash, bitmap);
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  private async draw(button: Button, colors: PageColors, geometry: RenderGeometry): Promise<Buffer> {
    const size = geometry.keySize;
    let background = parseHexColor(colors.backgroundColor);
    let text = parseHexColor(colors.textColor);
    if (!button.enabled) {
      background = dim(background);
      text = dim(text);
    }

    const image = new Jimp(size, size, 0x000000ff);
    fill(image, background);

    if (button.icon) {
      const icon = await this.loadIcon(button.icon);
      if (icon) {
        const inner = size - 2 * TEXT_MARGIN;
        icon.contain(inner, inner);
        if (!button.enabled) icon.brightness(-0.5);
        image.composite(icon, TEXT_MARGIN, TEXT_MARGIN);
      }
    }

    if (button.label.length > 0) {
      await this.drawLabel(image, button, text, size);
    }

    return encode(image, geometry);
  }

  private async drawLabel(image: JimpImage, button: Button, color: Rgb, size: number): Promise<void> {
    const lines = button.label.split('\n');
    const candidates = FONT_STEPS.filter(step => step <= button.fontSize);
    const loaded = new Map<number, Font>();
    for (const step of candidates.length > 0 ? candidates : [FONT_STEPS[FONT_STEPS.length - 1]]) {
      loaded.set(step, await fontFor(step));
    }

    const measure = (font: Font) => ({
      width: Math.max(...lines.map(line => Jimp.measureText(font, line))),
      height: lines.length * font.common.lineHeight
    });
    const inner = size - 2 * TEXT_MARGIN;
    const step = fitFontSize(button.fontSize, { width: inner, height: inner }, candidate => {
      const font = loaded.get(candidate);
      return font ? measure(font) : { width: Infinity, height: Infinity };
    });
    const font = loaded.get(step) ?? (await fontFor(step));

    const layer = new Jimp(size, size, 0x00000000);
    const lineHeight = font.common.lineHeight;
    let y = Math.floor((size - lines.length * lineHeight) / 2);
    for (const line of lines) {
      const x = Math.floor((size - Jimp.measureText(font, line)) / 2);
      layer.print(font, x, y, line);
      y += lineHeight;
    }
    tintInto(image, layer, color);
  }

  private async loadIcon(icon: string): Promise<JimpImage | null> {
    if (!this.iconsDir) return null;
    const file = path.resolve(this.iconsDir, icon);
    if (!file.startsWith(this.iconsDir + path.sep)) {
      console.warn(`[Render] Ignoring icon outside the icons directory: ${icon}`);
      return null;
    }
    try {
      return await readImage(file);
    } catch (error) {
      console.warn(`[Render] Failed to load icon ${icon}:`, error);
      return null;
    }
  }
}
