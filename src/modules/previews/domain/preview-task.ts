/** Payload of a `preview-generation` queue job. The request itself is read from the preview row. */
export interface PreviewTaskData {
  jobId: string;
  previewId: string;
}

export interface PreviewRunResult {
  status: 'active' | 'failed' | 'skipped';
  pageCount: number;
  failedPages: number[];
  error?: string;
}
