export type GenerationFailureReason =
  /** The provider reported FAILED or CANCELLED. */
  | 'server_failure'
  /** The poll budget ran out before a terminal status. */
  | 'timeout'
  /** The job completed but no image URL could be found in the result. */
  | 'no_image'
  | 'http_error'
  | 'transport_error';

export interface GenerationSuccess {
  ok: true;
  imageUrl: string;
  costUsd: number;
  latencyMs: number;
  model: string;
  metadata: Record<string, unknown>;
}

export interface GenerationFailure {
  ok: false;
  reason: GenerationFailureReason;
  message: string;
  latencyMs: number;
}

export type GenerationOutcome = GenerationSuccess | GenerationFailure;
