import { Module } from '@nestjs/common';
import { StorageModule } from '../storage/storage.module';
import { PDF_ASSEMBLER } from './domain/pdf-assembler.interface';
import { BookPdfService } from './infrastructure/book-pdf.service';

@Module({
  imports: [StorageModule],
  providers: [BookPdfService, { provide: PDF_ASSEMBLER, useExisting: BookPdfService }],
  exports: [PDF_ASSEMBLER],
})
export class PdfModule {}
