import { BadRequestException, Controller, Post, Req } from '@nestjs/common';
import type { MultipartFile } from '@fastify/multipart';
import type { FastifyRequest } from 'fastify';
import { UploadsService } from '../../application/uploads.service';

const FILE_TOO_LARGE = 'FST_REQ_FILE_TOO_LARGE';

@Controller('upload')
export class UploadsController {
  constructor(private readonly uploadsService: UploadsService) {}

  @Post('photo')
  async uploadPhoto(@Req() req: FastifyRequest) {
    if (!req.isMultipart()) {
      throw new BadRequestException('Expected a multipart/form-data request');
    }

    const file: MultipartFile | undefined = await req.file({
      limits: { fileSize: this.uploadsService.maxPhotoBytes, files: 1 },
    });
    if (!file) {
      throw new BadRequestException('Photo file is required');
    }

    let buffer: Buffer;
    try {
      buffer = await file.toBuffer();
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === FILE_TOO_LARGE) {
        throw new BadRequestException(this.uploadsService.tooLargeMessage());
      }
      throw error;
    }

    return this.uploadsService.uploadPhoto({ buffer, mimeType: file.mimetype });
  }
}
