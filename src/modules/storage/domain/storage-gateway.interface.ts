export interface StorageGateway {
  /** Store an object and return its public URL. */
  upload(key: string, body: Buffer, contentType: string): Promise<string>;
  /** Fetch bytes from a public URL, either one of ours or an external one. */
  download(url: string): Promise<Buffer>;
  /** Time-limited URL for an object key or one of our public URLs. */
  getSignedUrl(keyOrUrl: string, expiresInSeconds?: number): Promise<string>;
  /** Delete every object under the prefix; returns how many were removed. */
  deletePrefix(prefix: string): Promise<number>;
}

export const STORAGE_GATEWAY = Symbol('StorageGateway');
