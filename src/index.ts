export { normalizeAppName, parseAppList } from './pipeline/normalize';
export { BrewCatalogSource, loadCatalog } from './pipeline/catalog';
export type { CatalogKind, CatalogSource } from './pipeline/catalog';
export { resolve, resolveApps, runResolver } from './pipeline/resolver';
export type { ResolverOptions } from './pipeline/resolver';
export { enrich, enrichRecord, enrichRecords, parseResolvedFile, runEnricher, countVendorMatches } from './pipeline/enricher';
export type { EnricherOptions } from './pipeline/enricher';
export { lookupVendor, NOT_FOUND_URL } from './pipeline/vendors';
export { runSnapshot, SNAPSHOT_SCHEMA_VERSION } from './pipeline/snapshot';
export type { SnapshotInput, SnapshotOptions, SnapshotSummary } from './pipeline/snapshot';
export { verifySnapshotFile } from './pipeline/verify';
export type { SnapshotVerification } from './pipeline/verify';
export { runPipeline } from './pipeline/run';
export type { PipelineOptions, PipelineSummary } from './pipeline/run';
export type {
  BrewState,
  Confidence,
  EnrichedFile,
  EnrichedRecord,
  EnrichResult,
  ResolvedRecord,
  ResolveResult,
  UnresolvedInput,
  UnresolvedRecord,
} from './pipeline/schema';
export { PipelineError, describeError } from './utils/errors';
export type { PipelineErrorCode } from './utils/errors';
