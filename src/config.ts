import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';

dotenv.config();

export type StorageDriver = 'gcs' | 'fs';

// Project root: parent of src/ in dev, of dist/ once built
const baseDir = fs.existsSync(path.join(__dirname, '..', 'package.json'))
  ? path.join(__dirname, '..')
  : process.cwd();

function readVersion(): string {
  try {
    const raw = fs.readFileSync(path.join(baseDir, 'package.json'), 'utf-8');
    const pkg: unknown = JSON.parse(raw);
    if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch { /* no package.json next to the build */ }
  return '0.0.0';
}

function readStorageDriver(): StorageDriver {
  return process.env.STORAGE_DRIVER === 'fs' ? 'fs' : 'gcs';
}

export const config = {
  port: parseInt(process.env.PORT || '8080', 10),
  host: process.env.HOST || '0.0.0.0',
  logLevel: process.env.LOG_LEVEL || 'info',
  apiKey: process.env.API_KEY || '',
  bodyLimit: process.env.BODY_LIMIT || '10mb',
  storage: {
    driver: readStorageDriver(),
    bucket: process.env.GCS_BUCKET_NAME || '',
    localDir: process.env.STORAGE_DIR || path.join(baseDir, 'data', 'storage'),
  },
  coordinatesKey: process.env.COORDINATES_KEY || 'coordinates.json',
  templatesPrefix: 'templates/',
  contractsPrefix: 'contracts/',
  baseDir,
  version: readVersion(),
} as const;
