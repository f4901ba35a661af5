import { assertPreviewTransition, canAdvanceGenerationPhase, canTransitionPreviewStatus } from './preview-status';
import { InvalidStatusTransitionError } from './errors';

describe('preview status rules', () => {
  it.each([
    ['generating', 'active'],
    ['generating', 'failed'],
    ['active', 'purchased'],
    ['active', 'expired'],
    ['failed', 'generating'],
    ['expired', 'purchased'],
    ['purchased', 'purchased'],
  ] as const)('allows %s -> %s', (from, to) => {
    expect(canTransitionPreviewStatus(from, to)).toBe(true);
  });

  it.each([
    ['active', 'generating'],
    ['purchased', 'active'],
    ['purchased', 'expired'],
    ['expired', 'active'],
    ['failed', 'active'],
  ] as const)('rejects %s -> %s', (from, to) => {
    expect(canTransitionPreviewStatus(from, to)).toBe(false);
  });

  it('throws a typed error for an invalid transition', () => {
    expect(() => assertPreviewTransition('purchased', 'active')).toThrow(
      new InvalidStatusTransitionError('status', 'purchased', 'active'),
    );
  });

  it('only moves the generation phase forward', () => {
    expect(canAdvanceGenerationPhase('preview', 'generating_full')).toBe(true);
    expect(canAdvanceGenerationPhase('generating_full', 'complete')).toBe(true);
    expect(canAdvanceGenerationPhase('complete', 'preview')).toBe(false);
    expect(canAdvanceGenerationPhase('complete', 'failed')).toBe(false);
    expect(canAdvanceGenerationPhase('generating_full', 'failed')).toBe(true);
    expect(canAdvanceGenerationPhase('failed', 'generating_full')).toBe(true);
    expect(canAdvanceGenerationPhase('failed', 'complete')).toBe(false);
  });
});
