export interface DetectedFaces {
  faceCount: number;
  /** Share of the image covered by the largest face, 0 to 1. */
  largestFaceArea: number;
  /** Detector confidence that the largest face is a clear, front-facing face. */
  confidence: number;
}

export type FaceDetectionOutcome =
  | { ok: true; faces: DetectedFaces }
  | {
      ok: false;
      reason: 'not_configured' | 'request_failed' | 'unreadable_response';
      message: string;
    };

export interface FaceDetector {
  detect(image: Buffer): Promise<FaceDetectionOutcome>;
}

export const FACE_DETECTOR = Symbol('FaceDetector');
