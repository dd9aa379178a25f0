/** Minimal key/value object storage used for templates, coordinates and contracts */
export interface BlobStore {
  readonly kind: string;
  upload(key: string, bytes: Uint8Array, contentType: string): Promise<void>;
  /** Keys under `prefix`, ascending */
  list(prefix: string): Promise<string[]>;
  download(key: string): Promise<Buffer>;
}
