/**
 * Image boundary: turns an upload or a URL into a decoded RooftopImage.
 * Every failure becomes an ImageLoadError with a single user-facing message;
 * nothing is retried.
 */

import axios from 'axios';
import { loadImage } from '@napi-rs/canvas';
import {
  RooftopImage,
  ImageSource,
  ImageLoadError,
  createLogger,
  errorMessage,
} from '@rooftop/shared';

const logger = createLogger('IMAGE');

export interface ImageLoaderOptions {
  maxBytes: number;
  fetchTimeoutMs: number;
}

export interface ImageLoader {
  fromBase64(data: string): Promise<RooftopImage>;
  fromUrl(url: string): Promise<RooftopImage>;
}

const JPEG_MAGIC = [0xff, 0xd8, 0xff];
const PNG_MAGIC = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

function startsWith(bytes: Buffer, magic: number[]): boolean {
  return bytes.length >= magic.length && magic.every((byte, i) => bytes[i] === byte);
}

/**
 * Detect a supported raster format from its leading bytes
 */
export function detectMimeType(bytes: Buffer): RooftopImage['mimeType'] | null {
  if (startsWith(bytes, JPEG_MAGIC)) return 'image/jpeg';
  if (startsWith(bytes, PNG_MAGIC)) return 'image/png';
  return null;
}

/**
 * Accepts plain base64 or a data URL (data:image/png;base64,....)
 */
export function parseBase64Image(data: string): Buffer {
  const match = data.match(/^data:[^;,]*;base64,(.*)$/s);
  const payload = (match ? match[1] : data).replace(/\s+/g, '');
  return Buffer.from(payload, 'base64');
}

export async function decodeImage(
  bytes: Buffer,
  source: ImageSource,
  maxBytes: number
): Promise<RooftopImage> {
  if (bytes.length > maxBytes) {
    throw new ImageLoadError('too_large', `${bytes.length} bytes exceeds ${maxBytes}`);
  }

  const mimeType = detectMimeType(bytes);
  if (!mimeType) {
    throw new ImageLoadError('decode_failed', 'Not a JPEG or PNG payload');
  }

  let width: number;
  let height: number;
  try {
    const image = await loadImage(bytes);
    width = image.width;
    height = image.height;
  } catch (error) {
    throw new ImageLoadError('decode_failed', errorMessage(error));
  }

  if (!(width > 0 && height > 0)) {
    throw new ImageLoadError('decode_failed', `Invalid dimensions ${width}x${height}`);
  }

  return { width, height, source, mimeType, bytes };
}

export async function fetchImageBytes(url: string, options: ImageLoaderOptions): Promise<Buffer> {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ImageLoadError('unsupported_source', `Unparseable URL: ${url}`);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ImageLoadError('unsupported_source', `Protocol ${parsed.protocol} not allowed`);
  }

  try {
    const response = await axios.get<ArrayBuffer>(parsed.toString(), {
      responseType: 'arraybuffer',
      timeout: options.fetchTimeoutMs,
      maxContentLength: options.maxBytes,
    });
    return Buffer.from(response.data);
  } catch (error) {
    const detail = errorMessage(error);
    // axios aborts the download once the body passes maxContentLength
    if (/^maxContentLength size of \d+ exceeded$/.test(detail)) {
      throw new ImageLoadError('too_large', detail);
    }
    throw new ImageLoadError('fetch_failed', detail);
  }
}

export function createImageLoader(options: ImageLoaderOptions): ImageLoader {
  return {
    async fromBase64(data: string): Promise<RooftopImage> {
      const bytes = parseBase64Image(data);
      if (bytes.length === 0) {
        throw new ImageLoadError('decode_failed', 'Empty upload');
      }
      const image = await decodeImage(bytes, 'upload', options.maxBytes);
      logger.debug('Decoded uploaded image', { width: image.width, height: image.height });
      return image;
    },

    async fromUrl(url: string): Promise<RooftopImage> {
      const bytes = await fetchImageBytes(url, options);
      const image = await decodeImage(bytes, 'url', options.maxBytes);
      logger.debug('Decoded image from URL', { url, width: image.width, height: image.height });
      return image;
    },
  };
}
