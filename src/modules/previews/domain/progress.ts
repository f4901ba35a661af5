export const PREVIEW_PROGRESS = {
  start: 0,
  faceAnalysis: 5,
  cover: 10,
  pagesStart: 15,
  pagesSpan: 75,
  finalizing: 95,
  complete: 100,
} as const;

/** Progress reported before generating the page at `index` of `total`. */
export function pageProgress(index: number, total: number): number {
  if (total <= 0) return PREVIEW_PROGRESS.pagesStart;
  return PREVIEW_PROGRESS.pagesStart + Math.floor((index / total) * PREVIEW_PROGRESS.pagesSpan);
}

const DEFAULT_STEPS = {
  queued: 'Waiting to start',
  processing: 'Generating your story',
  completed: 'Complete',
  failed: 'Generation failed',
} as const;

export function defaultStepFor(status: keyof typeof DEFAULT_STEPS): string {
  return DEFAULT_STEPS[status];
}
