import { describe, it, expect } from 'vitest';
import * as api from './index';

describe('public entry point', () => {
  it('exports the pipeline operations and nothing test-only', () => {
    expect(Object.keys(api).sort()).toEqual([
      'BrewCatalogSource',
      'NOT_FOUND_URL',
      'PipelineError',
      'SNAPSHOT_SCHEMA_VERSION',
      'countVendorMatches',
      'describeError',
      'enrich',
      'enrichRecord',
      'enrichRecords',
      'loadCatalog',
      'lookupVendor',
      'normalizeAppName',
      'parseAppList',
      'parseResolvedFile',
      'resolve',
      'resolveApps',
      'runEnricher',
      'runPipeline',
      'runResolver',
      'runSnapshot',
      'verifySnapshotFile',
    ]);
  });
});
