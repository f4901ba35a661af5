import type { DetectedFaces } from '../../genai/domain/face-detector.interface';

export const MIN_FACE_AREA = 0.1;
export const MIN_FACE_CONFIDENCE = 0.7;
/** Variance of the Laplacian below which a photo counts as blurry. */
export const BLUR_THRESHOLD = 100;

export type FaceRejectionCode =
  | 'image_blurry'
  | 'no_face_detected'
  | 'multiple_faces'
  | 'face_too_small'
  | 'face_angle_invalid'
  | 'face_processing_error';

export type FaceValidationResult =
  | { valid: true; faceCount: number | null }
  | { valid: false; code: FaceRejectionCode; message: string; faceCount: number };

export const rejectFace = (
  code: FaceRejectionCode,
  message: string,
  faceCount = 0,
): FaceValidationResult => ({ valid: false, code, message, faceCount });

/** Exactly one face, large enough and facing the camera. */
export function judgeFaces(faces: DetectedFaces): FaceValidationResult {
  if (faces.faceCount === 0) {
    return rejectFace(
      'no_face_detected',
      "No face detected. Please upload a clear photo of your child's face.",
    );
  }
  if (faces.faceCount > 1) {
    return rejectFace(
      'multiple_faces',
      `Multiple faces detected (${faces.faceCount}). Please upload a photo with only one child.`,
      faces.faceCount,
    );
  }
  if (faces.largestFaceArea < MIN_FACE_AREA) {
    return rejectFace(
      'face_too_small',
      "Face is too small. Please take a closer photo of your child's face.",
      1,
    );
  }
  if (faces.confidence < MIN_FACE_CONFIDENCE) {
    return rejectFace(
      'face_angle_invalid',
      'Please ensure your child is facing the camera directly.',
      1,
    );
  }
  return { valid: true, faceCount: 1 };
}
