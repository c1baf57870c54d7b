import type { Frame, OutputSettings, PosterFormat } from '@domain/slideshow/index.js';
import sharp from 'sharp';

/** The frame flattened onto white and re-encoded as a still image. */
export async function encodePosterFrame(
  frame: Frame,
  format: PosterFormat,
  settings: Pick<OutputSettings, 'quality'>,
): Promise<Buffer> {
  const image = sharp(Buffer.from(frame.data.buffer, frame.data.byteOffset, frame.data.byteLength), {
    raw: { width: frame.width, height: frame.height, channels: 4 },
  }).flatten({ background: '#ffffff' });

  return format === 'jpeg' ? image.jpeg({ quality: settings.quality }).toBuffer() : image.png().toBuffer();
}
