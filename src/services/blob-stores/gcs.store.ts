import { Storage, type Bucket } from '@google-cloud/storage';
import type { BlobStore } from '../../models/blob-store.model';
import { StorageError } from '../../utils/errors';

/** Google Cloud Storage bucket; credentials come from the environment (ADC) */
export class GcsBlobStore implements BlobStore {
  readonly kind = 'gcs';
  private readonly bucket: Bucket;

  constructor(bucketName: string, storage: Storage = new Storage()) {
    this.bucket = storage.bucket(bucketName);
  }

  async upload(key: string, bytes: Uint8Array, contentType: string): Promise<void> {
    try {
      await this.bucket.file(key).save(Buffer.from(bytes), { contentType, resumable: false });
    } catch (error) {
      throw new StorageError('upload', key, error);
    }
  }

  async list(prefix: string): Promise<string[]> {
    try {
      const [files] = await this.bucket.getFiles({ prefix });
      return files.map((file) => file.name).sort();
    } catch (error) {
      throw new StorageError('list', prefix, error);
    }
  }

  async download(key: string): Promise<Buffer> {
    try {
      const [contents] = await this.bucket.file(key).download();
      return contents;
    } catch (error) {
      throw new StorageError('download', key, error);
    }
  }
}
