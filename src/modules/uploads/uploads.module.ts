import { Module } from '@nestjs/common';
import { GenAIModule } from '../genai/genai.module';
import { StorageModule } from '../storage/storage.module';
import { WatermarkModule } from '../watermark/watermark.module';
import { FaceValidationService } from './application/face-validation.service';
import { UploadsService } from './application/uploads.service';
import { UploadsController } from './interfaces/controllers/uploads.controller';

@Module({
  imports: [StorageModule, WatermarkModule, GenAIModule],
  controllers: [UploadsController],
  providers: [UploadsService, FaceValidationService],
})
export class UploadsModule {}
