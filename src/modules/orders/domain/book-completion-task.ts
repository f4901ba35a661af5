export interface BookCompletionTaskData {
  orderId: string;
  previewId: string;
  childName: string;
  /** generation_jobs row tracking this run. */
  jobId: string;
}

export const completionQueueJobId = (orderId: string) => `complete-${orderId}`;
