import { isRecord } from '../../../common/utils/types';

interface ImageUrlExtractor {
  shape: string;
  extract(payload: Record<string, unknown>): string | null;
}

const nonEmpty = (value: unknown): string | null =>
  typeof value === 'string' && value.trim().length > 0 ? value : null;

const urlOf = (value: unknown): string | null =>
  isRecord(value) ? nonEmpty(value.url) : null;

const firstItem = (value: unknown): unknown =>
  Array.isArray(value) && value.length > 0 ? value[0] : undefined;

/** Result shapes seen from generation providers, in priority order. */
export const IMAGE_URL_EXTRACTORS: readonly ImageUrlExtractor[] = [
  {
    shape: 'images[0].url',
    extract: (payload) => {
      const first = firstItem(payload.images);
      return nonEmpty(first) ?? urlOf(first);
    },
  },
  { shape: 'image.url', extract: (payload) => urlOf(payload.image) },
  { shape: 'image', extract: (payload) => nonEmpty(payload.image) },
  { shape: 'url', extract: (payload) => nonEmpty(payload.url) },
  { shape: 'data[0].url', extract: (payload) => urlOf(firstItem(payload.data)) },
];

export function extractImageUrl(payload: unknown): string | null {
  if (!isRecord(payload)) return null;

  for (const extractor of IMAGE_URL_EXTRACTORS) {
    const url = extractor.extract(payload);
    if (url) return url;
  }
  return null;
}
