import { z } from 'zod';

export const confidenceEnum = z.enum(['high', 'low']);

export const resolvedRecordSchema = z.object({
  app: z.string(),
  command: z.string(),
});

// Unknown fields on an unresolved record are carried through enrichment.
export const unresolvedRecordSchema = z.object({
  app: z.string().optional(),
  normalized: z.string().optional(),
}).passthrough();

// The enricher only reads `unresolved`; the installable bucket is not checked.
export const resolvedFileSchema = z.object({
  brew_installable: z.unknown().optional(),
  unresolved: z.array(unresolvedRecordSchema).optional(),
}).passthrough();

// brew_state.json as collected before resolution; missing lists are empty.
export const brewStateSchema = z.object({
  taps: z.array(z.string()).default([]),
  formulae: z.array(z.string()).default([]),
  casks: z.array(z.string()).default([]),
}).passthrough();

// Installable bucket as the snapshot reads it: entries without a command are skipped.
export const installableFileSchema = z.object({
  brew_installable: z.array(z.object({ command: z.string().optional() }).passthrough()).default([]),
}).passthrough();

export const enrichedFileSchema = z.object({
  unresolved: z.array(
    unresolvedRecordSchema.extend({
      official_download_url: z.string().optional(),
      confidence: confidenceEnum.optional(),
    })
  ).default([]),
}).passthrough();

export type Confidence = z.infer<typeof confidenceEnum>;
export type ResolvedRecord = z.infer<typeof resolvedRecordSchema>;
export type UnresolvedInput = z.infer<typeof unresolvedRecordSchema>;
export type BrewState = z.infer<typeof brewStateSchema>;
export type InstallableFile = z.infer<typeof installableFileSchema>;
export type EnrichedFile = z.infer<typeof enrichedFileSchema>;

export interface UnresolvedRecord {
  app: string;
  normalized: string;
}

export interface ResolveResult {
  brew_installable: ResolvedRecord[];
  unresolved: UnresolvedRecord[];
}

export type EnrichedRecord = UnresolvedInput & {
  official_download_url: string;
  confidence: Confidence;
};

export interface EnrichResult {
  unresolved: EnrichedRecord[];
}
