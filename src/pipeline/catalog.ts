import { executeFile } from '../executor/executor';
import { createStageLogger } from '../utils/logger';

const log = createStageLogger('catalog');

export type CatalogKind = 'formulae' | 'casks';

export interface CatalogSource {
  list(kind: CatalogKind): Promise<string[]>;
}

/** Lists installable names with `brew formulae` and `brew casks`. */
export class BrewCatalogSource implements CatalogSource {
  constructor(private readonly brewBin: string = 'brew') {}

  async list(kind: CatalogKind): Promise<string[]> {
    const stdout = await executeFile(this.brewBin, [kind]);
    return stdout.trim().split('\n');
  }
}

/**
 * Union of every formula and cask name the source knows.
 *
 * Fallback: when either query fails (missing binary, non-zero exit, bad
 * output) the catalog is empty and every app resolves as unresolved. The
 * run continues.
 */
export const loadCatalog = async (source: CatalogSource): Promise<ReadonlySet<string>> => {
  let formulae: string[];
  let casks: string[];

  try {
    formulae = await source.list('formulae');
    casks = await source.list('casks');
  } catch (err) {
    log.warn({ err }, 'Catalog query failed, continuing with an empty catalog');
    return new Set();
  }

  const catalog = new Set([...formulae, ...casks]);
  log.debug({ formulae: formulae.length, casks: casks.length, total: catalog.size }, 'Catalog loaded');
  return catalog;
};
