import {
  isRecord,
  parseLiteral,
  readNumber,
  readString,
} from '../../../../common/utils/types';
import {
  IMAGE_STYLES,
  type ImageStyle,
} from '../../../image-generation/domain/model-registry';

export const PREVIEW_STATUSES = ['generating', 'active', 'purchased', 'failed', 'expired'] as const;
export type PreviewStatus = (typeof PREVIEW_STATUSES)[number];

export const GENERATION_PHASES = ['preview', 'generating_full', 'complete', 'failed'] as const;
export type GenerationPhase = (typeof GENERATION_PHASES)[number];

export const CHILD_GENDERS = ['male', 'female'] as const;
export type ChildGender = (typeof CHILD_GENDERS)[number];

/** What the customer asked for. Never changes after creation. */
export interface GenerationRequest {
  childName: string;
  childAge: number;
  childGender: ChildGender;
  photoUrl: string;
  themeId: string;
  style: ImageStyle;
  seed: number | null;
}

export interface PageResult {
  pageNumber: number;
  /** Where the generation provider put the image. */
  sourceImageUrl: string;
  /** Our stored full-resolution copy. */
  imageUrl: string;
  /** Watermarked copy shown before purchase. */
  previewImageUrl: string | null;
  storyText: string;
  model: string;
  latencyMs: number;
  costUsd: number;
}

/** Who a preview belongs to: a guest browser session, a store customer, or both. */
export interface PreviewOwner {
  sessionId: string | null;
  customerId: string | null;
}

export interface Preview extends PreviewOwner {
  id: string;
  request: GenerationRequest;
  customerEmail: string | null;
  notifyOnComplete: boolean;
  faceAnalysis: string | null;
  coverUrl: string | null;
  pages: PageResult[];
  previewPageCount: number;
  totalPageCount: number;
  pdfUrl: string | null;
  generationPhase: GenerationPhase;
  status: PreviewStatus;
  createdAt: Date;
  updatedAt: Date;
  expiresAt: Date;
  /** Set once the preview's stored images have been deleted. */
  storagePurgedAt: Date | null;
}

export interface PreviewRow {
  id: string;
  child_name: string;
  child_age: number;
  child_gender: string;
  photo_url: string;
  theme_id: string;
  style: string;
  seed: number | null;
  session_id: string | null;
  customer_id: string | null;
  customer_email: string | null;
  notify_on_complete: boolean;
  face_analysis: string | null;
  cover_url: string | null;
  pages: unknown;
  preview_page_count: number;
  total_page_count: number;
  pdf_url: string | null;
  generation_phase: string;
  status: string;
  created_at: Date;
  updated_at: Date;
  expires_at: Date;
  storage_purged_at: Date | null;
}

export interface PreviewPatch {
  status?: PreviewStatus;
  generationPhase?: GenerationPhase;
  faceAnalysis?: string | null;
  coverUrl?: string | null;
  pages?: PageResult[];
  pdfUrl?: string | null;
  expiresAt?: Date;
  storagePurgedAt?: Date | null;
}

const byPageNumber = (a: PageResult, b: PageResult) => a.pageNumber - b.pageNumber;

/** Read the stored page list, dropping entries that are not usable pages. */
export function parsePageResults(value: unknown): PageResult[] {
  if (!Array.isArray(value)) return [];

  return value
    .flatMap((item): PageResult[] => {
      if (!isRecord(item)) return [];
      const pageNumber = readNumber(item, 'pageNumber');
      const imageUrl = readString(item, 'imageUrl');
      if (pageNumber === null || pageNumber < 1 || !imageUrl) return [];

      return [
        {
          pageNumber,
          imageUrl,
          sourceImageUrl: readString(item, 'sourceImageUrl') ?? imageUrl,
          previewImageUrl: readString(item, 'previewImageUrl'),
          storyText: readString(item, 'storyText') ?? '',
          model: readString(item, 'model') ?? 'unknown',
          latencyMs: readNumber(item, 'latencyMs') ?? 0,
          costUsd: readNumber(item, 'costUsd') ?? 0,
        },
      ];
    })
    .sort(byPageNumber);
}

/**
 * Append pages to an existing list. A page number that is already present
 * keeps its existing result.
 */
export function mergePages(existing: PageResult[], added: PageResult[]): PageResult[] {
  const merged = new Map(existing.map((page) => [page.pageNumber, page]));
  for (const page of added) {
    if (!merged.has(page.pageNumber)) {
      merged.set(page.pageNumber, page);
    }
  }
  return [...merged.values()].sort(byPageNumber);
}

/** Page numbers between 1 and `total` that have no result yet. */
export function missingPageNumbers(pages: PageResult[], total: number): number[] {
  const present = new Set(pages.map((page) => page.pageNumber));
  return Array.from({ length: total }, (_, index) => index + 1).filter(
    (pageNumber) => !present.has(pageNumber),
  );
}

export function rowToPreview(row: PreviewRow): Preview {
  return {
    id: row.id,
    request: {
      childName: row.child_name,
      childAge: row.child_age,
      childGender: parseLiteral(CHILD_GENDERS, row.child_gender, 'male'),
      photoUrl: row.photo_url,
      themeId: row.theme_id,
      style: parseLiteral(IMAGE_STYLES, row.style, 'photorealistic'),
      seed: row.seed,
    },
    sessionId: row.session_id,
    customerId: row.customer_id,
    customerEmail: row.customer_email,
    notifyOnComplete: row.notify_on_complete,
    faceAnalysis: row.face_analysis,
    coverUrl: row.cover_url,
    pages: parsePageResults(row.pages),
    previewPageCount: row.preview_page_count,
    totalPageCount: row.total_page_count,
    pdfUrl: row.pdf_url,
    generationPhase: parseLiteral(GENERATION_PHASES, row.generation_phase, 'preview'),
    status: parseLiteral(PREVIEW_STATUSES, row.status, 'failed'),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    expiresAt: row.expires_at,
    storagePurgedAt: row.storage_purged_at,
  };
}
