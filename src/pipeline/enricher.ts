import { PipelineError } from '../utils/errors';
import { readTextIfExists, writeJsonFile } from '../utils/fs';
import { createStageLogger } from '../utils/logger';
import {
  resolvedFileSchema,
  type EnrichedRecord,
  type EnrichResult,
  type UnresolvedInput,
} from './schema';
import { lookupVendor, NOT_FOUND_URL } from './vendors';

const log = createStageLogger('enricher');

export interface EnricherOptions {
  resolved: string;
  output: string;
}

export const enrichRecord = (record: UnresolvedInput): EnrichedRecord => {
  const url = lookupVendor(record.normalized ?? '');
  return url === undefined
    ? { ...record, official_download_url: NOT_FOUND_URL, confidence: 'low' }
    : { ...record, official_download_url: url, confidence: 'high' };
};

// Code-point order (same as UTF-8 byte order); a missing app sorts as ''.
const compareByApp = (a: UnresolvedInput, b: UnresolvedInput): number =>
  Buffer.compare(Buffer.from(a.app ?? '', 'utf8'), Buffer.from(b.app ?? '', 'utf8'));

export const enrichRecords = (records: UnresolvedInput[]): EnrichedRecord[] =>
  records.map(enrichRecord).sort(compareByApp);

/** Unresolved entries of a resolver output document. */
export const parseResolvedFile = (text: string, filePath: string): UnresolvedInput[] => {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new PipelineError('INVALID_RESOLVED_FILE', `${filePath} is not valid JSON`, { cause: error });
  }

  const parsed = resolvedFileSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new PipelineError('INVALID_RESOLVED_FILE', `${filePath} has an unexpected shape (${issues})`);
  }

  return parsed.data.unresolved ?? [];
};

export const enrich = async (resolvedPath: string): Promise<EnrichResult> => {
  const text = await readTextIfExists(resolvedPath);
  if (text === null) {
    log.info({ resolved: resolvedPath }, 'Resolved file not found, nothing to enrich');
    return { unresolved: [] };
  }
  return { unresolved: enrichRecords(parseResolvedFile(text, resolvedPath)) };
};

export const runEnricher = async (options: EnricherOptions): Promise<EnrichResult> => {
  const result = await enrich(options.resolved);
  await writeJsonFile(options.output, result);

  log.info(
    {
      unresolved: result.unresolved.length,
      vendorMatched: countVendorMatches(result),
      output: options.output,
    },
    'Enrichment complete'
  );
  return result;
};

export const countVendorMatches = (result: EnrichResult): number =>
  result.unresolved.filter((record) => record.confidence === 'high').length;
