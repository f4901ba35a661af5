import { Module } from '@nestjs/common';
import { StorageModule } from '../storage/storage.module';
import { FACE_ANALYZER } from './domain/face-analyzer.interface';
import { FACE_DETECTOR } from './domain/face-detector.interface';
import { FaceAnalysisService } from './infrastructure/face-analysis.service';
import { FaceDetectionService } from './infrastructure/face-detection.service';

@Module({
  imports: [StorageModule],
  providers: [
    FaceAnalysisService,
    FaceDetectionService,
    { provide: FACE_ANALYZER, useExisting: FaceAnalysisService },
    { provide: FACE_DETECTOR, useExisting: FaceDetectionService },
  ],
  exports: [FACE_ANALYZER, FACE_DETECTOR],
})
export class GenAIModule {}
