import sharp from 'sharp';

/** A flat colour: no edges at all, so it reads as blurry. */
export const solidPhoto = (width: number, height: number) =>
  sharp({ create: { width, height, channels: 3, background: { r: 200, g: 160, b: 120 } } })
    .png()
    .toBuffer();

/** Hard black and white blocks, far above any blur threshold. */
export function checkerboardPhoto(size = 64, block = 8): Promise<Buffer> {
  const pixels = Buffer.alloc(size * size);
  for (let y = 0; y < size; y++) {
    for (let x = 0; x < size; x++) {
      pixels[y * size + x] = (Math.floor(x / block) + Math.floor(y / block)) % 2 ? 255 : 0;
    }
  }
  return sharp(pixels, { raw: { width: size, height: size, channels: 1 } }).png().toBuffer();
}
