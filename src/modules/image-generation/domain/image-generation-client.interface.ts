import type { GenerationOutcome } from './generation-outcome';
import type { AspectRatio, ImageModel, ImageStyle } from './model-registry';

export interface ImageGenerationRequest {
  prompt: string;
  referenceImageUrl: string;
  style: ImageStyle;
  aspectRatio: AspectRatio;
  seed: number | null;
}

export interface ImageGenerationClient {
  /** Submit a raw provider input to a model endpoint and wait for the result. */
  submitAndWait(model: ImageModel, input: Record<string, unknown>): Promise<GenerationOutcome>;
  /** Build the provider input for a page or cover and run it. */
  generate(request: ImageGenerationRequest): Promise<GenerationOutcome>;
}

export const IMAGE_GENERATION_CLIENT = Symbol('ImageGenerationClient');
