import type { BlobStore } from '../models/blob-store.model';
import type { CoordinateCatalog } from '../models/coordinate-spec.model';
import type { TemplateStore } from '../models/template-source.model';
import { NotConfiguredError } from '../utils/errors';
import { logger } from '../utils/logger';
import { loadCoordinateCatalog, loadTemplateStore } from './resource-loader.service';

export interface Resources {
  readonly catalog: CoordinateCatalog;
  readonly templates: TemplateStore;
  readonly store: BlobStore;
}

export type RegistryStatus = 'pending' | 'ready' | 'unconfigured';

/**
 * Holds the read-only resources shared by all requests. Published once;
 * until then (or when storage is missing) callers get NotConfiguredError.
 */
export class ResourceRegistry {
  private current: Resources | undefined;
  private state: RegistryStatus = 'pending';

  get status(): RegistryStatus {
    return this.state;
  }

  publish(resources: Resources): void {
    if (this.current) {
      throw new Error('Resources have already been published');
    }
    this.current = resources;
    this.state = 'ready';
  }

  markUnconfigured(): void {
    this.state = 'unconfigured';
  }

  require(): Resources {
    if (!this.current) {
      throw new NotConfiguredError();
    }
    return this.current;
  }

  peek(): Resources | undefined {
    return this.current;
  }
}

export interface InitOptions {
  readonly coordinatesKey: string;
  readonly templatesPrefix: string;
}

/** Load catalog and templates from `store` and publish them */
export async function initRegistry(
  registry: ResourceRegistry,
  store: BlobStore | undefined,
  options: InitOptions,
): Promise<void> {
  if (!store) {
    registry.markUnconfigured();
    logger.fatal('Storage is not configured, document endpoints will fail');
    return;
  }

  const catalog = await loadCoordinateCatalog(store, options.coordinatesKey);
  const templates = await loadTemplateStore(store, options.templatesPrefix);
  registry.publish({ catalog, templates, store });

  logger.info(
    { store: store.kind, specs: catalog.names().length, templates: templates.names().length },
    'Resources ready',
  );
}
