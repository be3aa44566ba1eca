import { createStageLogger } from '../utils/logger';
import type { CatalogSource } from './catalog';
import { countVendorMatches, runEnricher } from './enricher';
import { runResolver } from './resolver';
import { runSnapshot } from './snapshot';

const log = createStageLogger('pipeline');

export interface PipelineOptions {
  appsRaw: string;
  brewState: string;
  /** Intermediate file written by the resolver and read by the enricher. */
  resolved: string;
  output: string;
  source: CatalogSource;
  /** When set, a snapshot is rendered here after enrichment. */
  snapshot?: string;
  now?: Date;
}

export interface PipelineSummary {
  installable: number;
  unresolved: number;
  vendorMatched: number;
}

// Enrichment starts only after the resolved file is fully written.
export const runPipeline = async (options: PipelineOptions): Promise<PipelineSummary> => {
  const resolution = await runResolver({
    appsRaw: options.appsRaw,
    brewState: options.brewState,
    output: options.resolved,
    source: options.source,
  });
  const enrichment = await runEnricher({ resolved: options.resolved, output: options.output });

  if (options.snapshot !== undefined) {
    await runSnapshot({
      brewState: options.brewState,
      resolved: options.resolved,
      enriched: options.output,
      output: options.snapshot,
      now: options.now,
    });
  }

  const summary: PipelineSummary = {
    installable: resolution.brew_installable.length,
    unresolved: enrichment.unresolved.length,
    vendorMatched: countVendorMatches(enrichment),
  };
  log.info(summary, 'Pipeline complete');
  return summary;
};
