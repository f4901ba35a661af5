import type { GenerationPhase, PreviewStatus } from './entities/preview.entity';
import { InvalidStatusTransitionError } from './errors';

const STATUS_TRANSITIONS: Record<PreviewStatus, readonly PreviewStatus[]> = {
  generating: ['active', 'failed', 'expired'],
  active: ['purchased', 'expired'],
  // Only an explicit job retry moves a failed preview back to generating.
  failed: ['generating', 'expired'],
  // Payment that lands within the purchase grace period.
  expired: ['purchased'],
  purchased: [],
};

const PHASE_RANK: Record<Exclude<GenerationPhase, 'failed'>, number> = {
  preview: 0,
  generating_full: 1,
  complete: 2,
};

/** Setting the current status again is always allowed. */
export function canTransitionPreviewStatus(from: PreviewStatus, to: PreviewStatus): boolean {
  return from === to || STATUS_TRANSITIONS[from].includes(to);
}

export function assertPreviewTransition(from: PreviewStatus, to: PreviewStatus): void {
  if (!canTransitionPreviewStatus(from, to)) {
    throw new InvalidStatusTransitionError('status', from, to);
  }
}

/**
 * Phases only move forward. A failed completion may be re-run, which puts
 * the preview back into generating_full.
 */
export function canAdvanceGenerationPhase(from: GenerationPhase, to: GenerationPhase): boolean {
  if (from === to) return true;
  if (to === 'failed') return from !== 'complete';
  if (from === 'failed') return to === 'generating_full';
  return PHASE_RANK[to] > PHASE_RANK[from];
}
