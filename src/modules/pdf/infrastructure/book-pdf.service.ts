import { Inject, Injectable, Logger } from '@nestjs/common';
import { jsPDF } from 'jspdf';
import sharp from 'sharp';
import {
  STORAGE_GATEWAY,
  type StorageGateway,
} from '../../storage/domain/storage-gateway.interface';
import { bookPdfKey } from '../../storage/domain/storage-keys';
import type { BookPdfInput, PdfAssembler } from '../domain/pdf-assembler.interface';

// Landscape 10 x 8 in, the same 5:4 ratio as the page illustrations.
const PAGE_WIDTH = 10;
const PAGE_HEIGHT = 8;
const MARGIN = 0.5;
const IMAGE_HEIGHT = 6;
const IMAGE_MAX_SIZE = 2000;

@Injectable()
export class BookPdfService implements PdfAssembler {
  private readonly logger = new Logger(BookPdfService.name);

  constructor(@Inject(STORAGE_GATEWAY) private readonly storage: StorageGateway) {}

  async generate(input: BookPdfInput): Promise<string> {
    const doc = new jsPDF({ orientation: 'landscape', unit: 'in', format: [PAGE_WIDTH, PAGE_HEIGHT] });

    const cover = await this.loadJpeg(input.coverUrl);
    doc.addImage(cover, 'JPEG', 0, 0, PAGE_WIDTH, PAGE_HEIGHT);
    doc.setFillColor(255, 255, 255);
    doc.rect(0, PAGE_HEIGHT - 1.6, PAGE_WIDTH, 1.6, 'F');
    doc.setFont('times', 'bold');
    doc.setFontSize(30);
    doc.setTextColor(60, 45, 120);
    doc.text(doc.splitTextToSize(input.title, PAGE_WIDTH - MARGIN * 2), PAGE_WIDTH / 2, PAGE_HEIGHT - 0.9, {
      align: 'center',
    });

    const pages = [...input.pages].sort((a, b) => a.pageNumber - b.pageNumber);
    for (const page of pages) {
      doc.addPage([PAGE_WIDTH, PAGE_HEIGHT], 'landscape');

      const image = await this.loadJpeg(page.imageUrl);
      const imageWidth = IMAGE_HEIGHT * 1.25;
      doc.addImage(image, 'JPEG', (PAGE_WIDTH - imageWidth) / 2, MARGIN / 2, imageWidth, IMAGE_HEIGHT);

      doc.setFont('times', 'normal');
      doc.setFontSize(16);
      doc.setTextColor(40, 40, 40);
      const lines = doc.splitTextToSize(page.storyText, PAGE_WIDTH - MARGIN * 3);
      doc.text(lines, PAGE_WIDTH / 2, IMAGE_HEIGHT + MARGIN * 1.3, { align: 'center' });

      doc.setFontSize(9);
      doc.setTextColor(150, 150, 150);
      doc.text(String(page.pageNumber), PAGE_WIDTH / 2, PAGE_HEIGHT - MARGIN / 2, { align: 'center' });
    }

    const pdf = Buffer.from(doc.output('arraybuffer'));
    const url = await this.storage.upload(bookPdfKey(input.previewId), pdf, 'application/pdf');

    this.logger.log(
      `Preview ${input.previewId}: assembled ${pages.length}-page PDF (${Math.round(pdf.length / 1024)} KB)`,
    );
    return url;
  }

  private async loadJpeg(url: string): Promise<Uint8Array> {
    const source = await this.storage.download(url);
    const jpeg = await sharp(source)
      .resize({ width: IMAGE_MAX_SIZE, height: IMAGE_MAX_SIZE, fit: 'inside', withoutEnlargement: true })
      .jpeg({ quality: 90 })
      .toBuffer();
    return new Uint8Array(jpeg);
  }
}
