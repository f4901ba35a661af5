import type { GenerationJob } from '../modules/jobs/domain/entities/generation-job.entity';
import type { PageResult, Preview } from '../modules/previews/domain/entities/preview.entity';
import type { Order } from '../modules/orders/domain/entities/order.entity';

const DAY_MS = 24 * 60 * 60 * 1000;

export function buildPreview(overrides: Partial<Preview> = {}): Preview {
  const now = new Date();
  return {
    id: 'preview-1',
    request: {
      childName: 'Leo',
      childAge: 5,
      childGender: 'male',
      photoUrl: 'https://cdn.test/uploads/leo.jpg',
      themeId: 'space-explorer',
      style: 'photorealistic',
      seed: null,
    },
    sessionId: null,
    customerId: null,
    customerEmail: null,
    notifyOnComplete: false,
    faceAnalysis: null,
    coverUrl: null,
    pages: [],
    previewPageCount: 5,
    totalPageCount: 10,
    pdfUrl: null,
    generationPhase: 'preview',
    status: 'generating',
    createdAt: now,
    updatedAt: now,
    expiresAt: new Date(now.getTime() + 7 * DAY_MS),
    storagePurgedAt: null,
    ...overrides,
  };
}

export function buildPage(pageNumber: number, overrides: Partial<PageResult> = {}): PageResult {
  const nn = String(pageNumber).padStart(2, '0');
  return {
    pageNumber,
    sourceImageUrl: `https://gen.test/earlier-${pageNumber}.png`,
    imageUrl: `https://cdn.test/final/preview-1/page_${nn}.jpg`,
    previewImageUrl: `https://cdn.test/final/preview-1/preview_${nn}.jpg`,
    storyText: `Page ${pageNumber} text`,
    model: 'flux-pulid-photo',
    latencyMs: 1000,
    costUsd: 0.05,
    ...overrides,
  };
}

export function buildJob(overrides: Partial<GenerationJob> = {}): GenerationJob {
  return {
    id: 'job-1',
    jobType: 'preview_generation',
    referenceId: 'preview-1',
    status: 'queued',
    progress: 0,
    currentStep: 'Queued',
    attempts: 1,
    maxAttempts: 3,
    errorMessage: null,
    resultData: null,
    queuedAt: new Date(),
    startedAt: null,
    completedAt: null,
    ...overrides,
  };
}

export function buildOrder(overrides: Partial<Order> = {}): Order {
  const now = new Date();
  return {
    id: 'order-1',
    externalOrderId: '5551001',
    orderNumber: '#1001',
    previewId: 'preview-1',
    customerEmail: 'parent@example.com',
    customerName: 'Sam Parent',
    status: 'paid',
    retryCount: 0,
    errorMessage: null,
    pdfUrl: null,
    createdAt: now,
    updatedAt: now,
    completedAt: null,
    expiresAt: new Date(now.getTime() + 30 * DAY_MS),
    ...overrides,
  };
}
