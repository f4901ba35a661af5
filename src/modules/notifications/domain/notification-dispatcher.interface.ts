export interface NotificationPayloads {
  preview_ready: { childName: string; previewUrl: string };
  book_ready: { childName: string; bookTitle: string; downloadUrl: string };
}

export type NotificationKind = keyof NotificationPayloads;

export interface NotificationDispatcher {
  /** Best effort; resolves false instead of throwing when delivery fails. */
  send<K extends NotificationKind>(
    to: string,
    kind: K,
    payload: NotificationPayloads[K],
  ): Promise<boolean>;
}

export const NOTIFICATION_DISPATCHER = Symbol('NotificationDispatcher');
