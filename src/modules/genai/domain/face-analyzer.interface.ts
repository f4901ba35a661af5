export type FaceAnalysisOutcome =
  | { ok: true; description: string }
  | { ok: false; reason: 'not_configured' | 'empty_response' | 'request_failed'; message: string };

export interface FaceAnalyzer {
  analyze(photoUrl: string): Promise<FaceAnalysisOutcome>;
}

export const FACE_ANALYZER = Symbol('FaceAnalyzer');

/** Used in place of a description when the photo could not be analyzed. */
export const FALLBACK_FACE_DESCRIPTION = 'a cute child';
