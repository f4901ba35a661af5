import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import sharp from 'sharp';
import {
  FACE_DETECTOR,
  type FaceDetector,
} from '../../genai/domain/face-detector.interface';
import {
  BLUR_THRESHOLD,
  judgeFaces,
  rejectFace,
  type FaceValidationResult,
} from '../domain/face-validation';

const LAPLACIAN = [0, 1, 0, 1, -4, 1, 0, 1, 0];
const SHARPNESS_SAMPLE_WIDTH = 1024;

/**
 * Checks an uploaded photo before it is stored: not blurry, then exactly one
 * usable face. Without a configured vision model only the blur check runs.
 */
@Injectable()
export class FaceValidationService {
  private readonly logger = new Logger(FaceValidationService.name);
  private readonly enabled: boolean;

  constructor(
    @Inject(FACE_DETECTOR) private readonly detector: FaceDetector,
    configService: ConfigService,
  ) {
    this.enabled = configService.get<boolean>('uploads.faceValidation') ?? true;
  }

  async validate(photo: Buffer): Promise<FaceValidationResult> {
    if (!this.enabled) {
      return { valid: true, faceCount: null };
    }

    const sharpness = await this.measureSharpness(photo);
    if (sharpness < BLUR_THRESHOLD) {
      this.logger.warn(`Rejected blurry photo (sharpness ${sharpness.toFixed(1)})`);
      return rejectFace(
        'image_blurry',
        'Image quality is too low. Please upload a clear, non-blurry photo.',
      );
    }

    const detection = await this.detector.detect(photo);
    if (!detection.ok) {
      if (detection.reason === 'not_configured') {
        this.logger.warn('Vision model not configured; skipping face detection');
        return { valid: true, faceCount: null };
      }
      return rejectFace(
        'face_processing_error',
        'Unable to process face data. Please try again.',
      );
    }

    const result = judgeFaces(detection.faces);
    if (!result.valid) {
      this.logger.warn(`Rejected photo: ${result.code}`);
    }
    return result;
  }

  /** Variance of the Laplacian of the greyscale image. */
  async measureSharpness(photo: Buffer): Promise<number> {
    const { channels } = await sharp(photo)
      .resize({ width: SHARPNESS_SAMPLE_WIDTH, withoutEnlargement: true })
      .greyscale()
      .convolve({ width: 3, height: 3, kernel: LAPLACIAN, scale: 1, offset: 128 })
      .stats();
    const [grey] = channels;
    return grey ? grey.stdev * grey.stdev : 0;
  }
}
