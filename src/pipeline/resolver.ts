import { readTextIfExists, writeJsonFile } from '../utils/fs';
import { createStageLogger } from '../utils/logger';
import { loadCatalog, type CatalogSource } from './catalog';
import { normalizeAppName, parseAppList } from './normalize';
import type { ResolveResult } from './schema';

const log = createStageLogger('resolver');

export interface ResolverOptions {
  appsRaw: string;
  /** Reserved. Accepted on the command line, never read. */
  brewState: string;
  output: string;
  source: CatalogSource;
}

export const resolveApps = (apps: string[], catalog: ReadonlySet<string>): ResolveResult => {
  const result: ResolveResult = { brew_installable: [], unresolved: [] };

  for (const app of apps) {
    const normalized = normalizeAppName(app);
    if (catalog.has(normalized)) {
      result.brew_installable.push({ app, command: normalized });
    } else {
      result.unresolved.push({ app, normalized });
    }
  }

  return result;
};

/** A missing apps file resolves to two empty buckets. */
export const resolve = async (
  appsRawPath: string,
  catalog: ReadonlySet<string>
): Promise<ResolveResult> => {
  const text = await readTextIfExists(appsRawPath);
  if (text === null) {
    log.info({ appsRaw: appsRawPath }, 'Apps list not found, nothing to resolve');
    return { brew_installable: [], unresolved: [] };
  }
  return resolveApps(parseAppList(text), catalog);
};

export const runResolver = async (options: ResolverOptions): Promise<ResolveResult> => {
  log.debug({ brewState: options.brewState }, 'Brew state path is reserved and not read');

  const catalog = await loadCatalog(options.source);
  const result = await resolve(options.appsRaw, catalog);
  await writeJsonFile(options.output, result);

  log.info(
    {
      installable: result.brew_installable.length,
      unresolved: result.unresolved.length,
      output: options.output,
    },
    'Resolution complete'
  );
  return result;
};
