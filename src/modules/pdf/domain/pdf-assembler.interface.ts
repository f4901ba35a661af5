export interface BookPage {
  pageNumber: number;
  imageUrl: string;
  storyText: string;
}

export interface BookPdfInput {
  previewId: string;
  title: string;
  childName: string;
  coverUrl: string;
  pages: BookPage[];
}

export interface PdfAssembler {
  /** Render and store the book; resolves to the PDF's public URL. */
  generate(input: BookPdfInput): Promise<string>;
}

export const PDF_ASSEMBLER = Symbol('PdfAssembler');
