import { randomUUID } from 'crypto';
import { BadRequestException, Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  STORAGE_GATEWAY,
  type StorageGateway,
} from '../../storage/domain/storage-gateway.interface';
import { uploadKey } from '../../storage/domain/storage-keys';
import { WatermarkService } from '../../watermark/application/watermark.service';
import { FaceValidationService } from './face-validation.service';

export const ACCEPTED_PHOTO_TYPES = ['image/jpeg', 'image/png', 'image/webp'] as const;
const DEFAULT_MAX_PHOTO_BYTES = 10 * 1024 * 1024;

export interface PhotoUpload {
  buffer: Buffer;
  mimeType: string;
}

export interface PhotoUploadResult {
  photoUrl: string;
  faceValid: true;
  /** Null when face detection did not run. */
  faceCount: number | null;
}

@Injectable()
export class UploadsService {
  private readonly logger = new Logger(UploadsService.name);
  readonly maxPhotoBytes: number;

  constructor(
    @Inject(STORAGE_GATEWAY)
    private readonly storage: StorageGateway,
    private readonly watermarkService: WatermarkService,
    private readonly faceValidation: FaceValidationService,
    configService: ConfigService,
  ) {
    this.maxPhotoBytes =
      configService.get<number>('uploads.maxPhotoBytes') ?? DEFAULT_MAX_PHOTO_BYTES;
  }

  /**
   * Normalizes the child's photo to JPEG, checks it shows one clear face and
   * stores it for preview creation.
   */
  async uploadPhoto(upload: PhotoUpload): Promise<PhotoUploadResult> {
    if (!ACCEPTED_PHOTO_TYPES.some((type) => type === upload.mimeType)) {
      throw new BadRequestException('Invalid file type. Please upload a JPEG, PNG or WebP image.');
    }
    if (upload.buffer.length === 0) {
      throw new BadRequestException('File is empty');
    }
    if (upload.buffer.length > this.maxPhotoBytes) {
      throw new BadRequestException(this.tooLargeMessage());
    }

    let normalized: Buffer;
    try {
      normalized = await this.watermarkService.normalizePhoto(upload.buffer);
    } catch (error) {
      this.logger.warn(
        `Rejected unreadable photo: ${error instanceof Error ? error.message : String(error)}`,
      );
      throw new BadRequestException('Could not read the image. Please upload another photo.');
    }

    const validation = await this.faceValidation.validate(normalized);
    if (!validation.valid) {
      throw new BadRequestException({
        statusCode: 400,
        code: validation.code,
        message: validation.message,
        faceCount: validation.faceCount,
      });
    }

    const photoUrl = await this.storage.upload(uploadKey(randomUUID()), normalized, 'image/jpeg');
    this.logger.log(`Photo uploaded (${upload.buffer.length} bytes): ${photoUrl}`);
    return { photoUrl, faceValid: true, faceCount: validation.faceCount };
  }

  tooLargeMessage(): string {
    const megabytes = Math.round(this.maxPhotoBytes / (1024 * 1024));
    return `File too large. Please upload an image smaller than ${megabytes}MB.`;
  }
}
