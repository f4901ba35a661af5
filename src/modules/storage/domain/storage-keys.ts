const pad = (pageNumber: number) => String(pageNumber).padStart(2, '0');

/** Everything generated for a preview lives under this prefix. */
export const previewFolder = (previewId: string) => `final/${previewId}/`;

export const coverKey = (previewId: string) => `${previewFolder(previewId)}cover.jpg`;

export const pageImageKey = (previewId: string, pageNumber: number) =>
  `${previewFolder(previewId)}page_${pad(pageNumber)}.jpg`;

export const previewImageKey = (previewId: string, pageNumber: number) =>
  `${previewFolder(previewId)}preview_${pad(pageNumber)}.jpg`;

export const bookPdfKey = (previewId: string) => `${previewFolder(previewId)}storybook.pdf`;

export const uploadKey = (uploadId: string) => `uploads/${uploadId}.jpg`;
