import path from 'path';
import type { BlobStore } from '../models/blob-store.model';
import type { CoordinateCatalog, CoordinateSpec } from '../models/coordinate-spec.model';
import type { TemplateDocument, TemplateStore } from '../models/template-source.model';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { coordinateCatalogSchema } from '../validators/coordinates.validator';

class MapCoordinateCatalog implements CoordinateCatalog {
  constructor(private readonly specs: ReadonlyMap<string, CoordinateSpec>) {}

  lookup(templateName: string): CoordinateSpec | undefined {
    return this.specs.get(templateName);
  }

  names(): readonly string[] {
    return [...this.specs.keys()];
  }
}

class MapTemplateStore implements TemplateStore {
  constructor(private readonly templates: ReadonlyMap<string, TemplateDocument>) {}

  lookup(templateName: string): TemplateDocument | undefined {
    return this.templates.get(templateName);
  }

  names(): readonly string[] {
    return [...this.templates.keys()];
  }
}

export function createCoordinateCatalog(specs: Readonly<Record<string, CoordinateSpec>>): CoordinateCatalog {
  return new MapCoordinateCatalog(new Map(Object.entries(specs)));
}

export function createTemplateStore(templates: readonly TemplateDocument[]): TemplateStore {
  return new MapTemplateStore(new Map(templates.map((t) => [t.name, t])));
}

/** Parse coordinates.json contents; throws on malformed JSON or layout */
export function parseCoordinateCatalog(raw: string): CoordinateCatalog {
  const parsed = coordinateCatalogSchema.parse(JSON.parse(raw));
  return createCoordinateCatalog(parsed);
}

/** Load the coordinate catalog; any failure leaves it empty */
export async function loadCoordinateCatalog(store: BlobStore, key: string): Promise<CoordinateCatalog> {
  try {
    const raw = await store.download(key);
    const catalog = parseCoordinateCatalog(raw.toString('utf-8'));
    logger.info({ key, count: catalog.names().length }, 'Coordinate catalog loaded');
    return catalog;
  } catch (error) {
    logger.error({ key, error: errorMessage(error) }, 'Failed to load coordinate catalog, starting with none');
    return createCoordinateCatalog({});
  }
}

/** Cache every `<prefix>*.pdf` under its base name; unreadable templates are skipped */
export async function loadTemplateStore(store: BlobStore, prefix: string): Promise<TemplateStore> {
  let keys: string[];
  try {
    keys = await store.list(prefix);
  } catch (error) {
    logger.error({ prefix, error: errorMessage(error) }, 'Failed to list templates, starting with none');
    return createTemplateStore([]);
  }

  const templates: TemplateDocument[] = [];
  for (const key of keys.filter((k) => k.toLowerCase().endsWith('.pdf'))) {
    try {
      const bytes = await store.download(key);
      const name = path.posix.basename(key, path.posix.extname(key));
      templates.push({ name, bytes: new Uint8Array(bytes) });
      logger.info({ key, name }, 'Cached template');
    } catch (error) {
      logger.error({ key, error: errorMessage(error) }, 'Failed to cache template');
    }
  }

  return createTemplateStore(templates);
}
