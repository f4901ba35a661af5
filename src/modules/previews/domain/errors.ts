import type { GenerationFailureReason } from '../../image-generation/domain/generation-outcome';

export class PreviewNotFoundError extends Error {
  constructor(readonly previewId: string) {
    super(`Preview ${previewId} not found`);
    this.name = 'PreviewNotFoundError';
  }
}

export class UnknownThemeError extends Error {
  constructor(readonly themeId: string) {
    super(`Unknown story theme: ${themeId}`);
    this.name = 'UnknownThemeError';
  }
}

export class PageGenerationError extends Error {
  constructor(
    readonly pageNumber: number,
    readonly reason: GenerationFailureReason,
    detail: string,
  ) {
    super(`Page ${pageNumber} failed (${reason}): ${detail}`);
    this.name = 'PageGenerationError';
  }
}

export class InvalidStatusTransitionError extends Error {
  constructor(field: 'status' | 'generationPhase', from: string, to: string) {
    super(`Invalid preview ${field} transition: ${from} -> ${to}`);
    this.name = 'InvalidStatusTransitionError';
  }
}
