import path from 'path';
import type { BlobStore } from '../models/blob-store.model';
import { DocumentNotFoundError } from '../utils/errors';
import type { BindingContext } from './binding-context.service';

export const UNKNOWN_CUSTOMER = 'UNKNOWN_NIPT';
export const PDF_CONTENT_TYPE = 'application/pdf';

const CUSTOMER_ID_FIELDS = ['customer_nipt', 'nipt'] as const;
const TIMESTAMP_DIGITS = 14;

export interface StoredDocument {
  readonly key: string;
  readonly fileName: string;
  readonly bytes: Buffer;
}

/** Customer id a generated document is filed under */
export function resolveCustomerId(context: BindingContext): string {
  for (const field of CUSTOMER_ID_FIELDS) {
    const value = context.text(field)?.trim();
    if (value) return value;
  }
  return UNKNOWN_CUSTOMER;
}

/**
 * YYYYMMDDHHmmss, fixed width so keys sort chronologically. Always UTC,
 * not server local time: a key written at 09:30 in Tirana (UTC+1) reads 0830.
 */
export function formatTimestamp(date: Date): string {
  const pad = (n: number, width = 2) => String(n).padStart(width, '0');
  return [
    pad(date.getUTCFullYear(), 4),
    pad(date.getUTCMonth() + 1),
    pad(date.getUTCDate()),
    pad(date.getUTCHours()),
    pad(date.getUTCMinutes()),
    pad(date.getUTCSeconds()),
  ].join('');
}

export function customerPrefix(prefix: string, customerId: string): string {
  return `${prefix}${customerId}_`;
}

export function buildDocumentKey(prefix: string, customerId: string, date: Date): string {
  return `${customerPrefix(prefix, customerId)}${formatTimestamp(date)}.pdf`;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Stored keys for one customer, oldest first */
export async function listCustomerDocuments(
  store: BlobStore,
  prefix: string,
  customerId: string,
): Promise<string[]> {
  const ownKey = new RegExp(`^${escapeRegExp(customerPrefix(prefix, customerId))}\\d{${TIMESTAMP_DIGITS}}\\.pdf$`);
  const keys = await store.list(customerPrefix(prefix, customerId));
  return keys.filter((key) => ownKey.test(key)).sort();
}

export async function fetchLatestDocument(
  store: BlobStore,
  prefix: string,
  customerId: string,
): Promise<StoredDocument> {
  const keys = await listCustomerDocuments(store, prefix, customerId);
  const latest = keys[keys.length - 1];
  if (latest === undefined) {
    throw new DocumentNotFoundError(customerId);
  }
  return { key: latest, fileName: path.posix.basename(latest), bytes: await store.download(latest) };
}

export async function fetchAllDocuments(
  store: BlobStore,
  prefix: string,
  customerId: string,
): Promise<StoredDocument[]> {
  const keys = await listCustomerDocuments(store, prefix, customerId);
  if (keys.length === 0) {
    throw new DocumentNotFoundError(customerId);
  }

  const documents: StoredDocument[] = [];
  for (const key of keys) {
    documents.push({ key, fileName: path.posix.basename(key), bytes: await store.download(key) });
  }
  return documents;
}
