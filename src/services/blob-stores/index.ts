import { config } from '../../config';
import type { BlobStore } from '../../models/blob-store.model';
import { logger } from '../../utils/logger';
import { FsBlobStore } from './fs.store';
import { GcsBlobStore } from './gcs.store';

export { FsBlobStore } from './fs.store';
export { GcsBlobStore } from './gcs.store';

/** Build the configured store, or undefined when storage is not configured */
export function createBlobStore(): BlobStore | undefined {
  if (config.storage.driver === 'fs') {
    logger.info({ dir: config.storage.localDir }, 'Using local directory storage');
    return new FsBlobStore(config.storage.localDir);
  }

  if (!config.storage.bucket) {
    logger.fatal('GCS_BUCKET_NAME environment variable not set');
    return undefined;
  }

  logger.info({ bucket: config.storage.bucket }, 'Using GCS bucket storage');
  return new GcsBlobStore(config.storage.bucket);
}
