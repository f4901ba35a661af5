import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import sharp from 'sharp';

const MAX_INPUT_PIXELS = 60_000_000;
const DEFAULT_PREVIEW_MAX_SIZE = 1024;
const MIN_PREVIEW_MAX_SIZE = 256;
const DEFAULT_PHOTO_MAX_SIZE = 2048;
const PHOTO_QUALITY = 92;
const PREVIEW_QUALITY = 80;
const FONT_SCALE = 0.16;
const MIN_FONT_SIZE = 32;
const MAX_FONT_SIZE = 200;
const TEXT_WIDTH_FACTOR = 0.62;

const SHARP_INPUT_OPTIONS = {
  failOn: 'none' as const,
  sequentialRead: true,
  limitInputPixels: MAX_INPUT_PIXELS,
};

const clamp = (value: number, min: number, max: number) =>
  Math.min(Math.max(value, min), max);

sharp.cache({ memory: 50, files: 20, items: 100 });
sharp.concurrency(1);

const escapeXml = (text: string) =>
  text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');

@Injectable()
export class WatermarkService {
  private readonly logger = new Logger(WatermarkService.name);
  private readonly previewMaxSize: number;

  constructor(private readonly configService: ConfigService) {
    const configured = this.configService.get<number>('images.previewMaxSize');
    const resolved =
      configured !== undefined && Number.isFinite(configured)
        ? configured
        : DEFAULT_PREVIEW_MAX_SIZE;
    this.previewMaxSize = Math.max(MIN_PREVIEW_MAX_SIZE, Math.round(resolved));
  }

  /**
   * Downscaled JPEG copy of a book page with a tiled diagonal "PREVIEW" mark.
   */
  async applyPreviewWatermark(imageBuffer: Buffer, text = 'PREVIEW'): Promise<Buffer> {
    const { width, height } = await this.getDimensions(imageBuffer);
    const scale = Math.min(1, this.previewMaxSize / Math.max(width, height));
    const targetWidth = Math.max(1, Math.round(width * scale));
    const targetHeight = Math.max(1, Math.round(height * scale));

    const pipeline = sharp(imageBuffer, SHARP_INPUT_OPTIONS).rotate();
    if (scale < 1) {
      pipeline.resize({
        width: targetWidth,
        height: targetHeight,
        fit: 'inside',
        withoutEnlargement: true,
      });
    }

    const tile = this.createWatermarkTile(text, targetWidth, targetHeight);
    const result = await pipeline
      .composite([{ input: Buffer.from(tile), tile: true, top: 0, left: 0 }])
      .jpeg({ quality: PREVIEW_QUALITY })
      .toBuffer();

    this.logger.debug(`Applied preview watermark (${targetWidth}x${targetHeight})`);
    return result;
  }

  /**
   * Re-encode an uploaded photo as an upright JPEG no larger than the
   * configured bound.
   */
  async normalizePhoto(
    imageBuffer: Buffer,
    maxSize = DEFAULT_PHOTO_MAX_SIZE,
  ): Promise<Buffer> {
    return sharp(imageBuffer, SHARP_INPUT_OPTIONS)
      .rotate()
      .resize({ width: maxSize, height: maxSize, fit: 'inside', withoutEnlargement: true })
      .jpeg({ quality: PHOTO_QUALITY })
      .toBuffer();
  }

  private async getDimensions(imageBuffer: Buffer): Promise<{ width: number; height: number }> {
    const metadata = await sharp(imageBuffer, SHARP_INPUT_OPTIONS).metadata();
    if (metadata.width && metadata.height) {
      return { width: metadata.width, height: metadata.height };
    }

    const { info } = await sharp(imageBuffer, SHARP_INPUT_OPTIONS).toBuffer({
      resolveWithObject: true,
    });
    return { width: info.width, height: info.height };
  }

  private createWatermarkTile(text: string, width: number, height: number): string {
    const textLength = Math.max(text.trim().length, 1);
    const fontSize = clamp(
      Math.round(Math.min(width, height) * FONT_SCALE),
      MIN_FONT_SIZE,
      MAX_FONT_SIZE,
    );
    // Composite inputs may not exceed the base image.
    const tileWidth = Math.min(
      width,
      Math.round(fontSize * textLength * TEXT_WIDTH_FACTOR + fontSize * 1.5),
    );
    const tileHeight = Math.min(height, Math.round(fontSize * 2.6));
    const strokeWidth = Math.max(Math.round(fontSize * 0.08), 2);

    return `
      <svg width="${tileWidth}" height="${tileHeight}" xmlns="http://www.w3.org/2000/svg">
        <g transform="translate(${Math.round(tileWidth / 2)} ${Math.round(tileHeight / 2)}) rotate(-30)">
          <text x="0" y="0"
            font-family="DejaVu Sans, Arial, Helvetica, sans-serif"
            font-size="${fontSize}"
            font-weight="bold"
            fill="rgba(255, 255, 255, 0.45)"
            stroke="rgba(80, 80, 80, 0.3)"
            stroke-width="${strokeWidth}"
            text-anchor="middle"
            dominant-baseline="middle">${escapeXml(text)}</text>
        </g>
      </svg>
    `;
  }
}
