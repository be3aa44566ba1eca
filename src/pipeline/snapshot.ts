import type { z } from 'zod';
import { readTextIfExists, writeTextFile } from '../utils/fs';
import { createStageLogger } from '../utils/logger';
import {
  brewStateSchema,
  enrichedFileSchema,
  installableFileSchema,
  type BrewState,
  type EnrichedFile,
} from './schema';

const log = createStageLogger('snapshot');

export const SNAPSHOT_SCHEMA_VERSION = '0.1';

export const SNAPSHOT_SECTIONS = {
  taps: 'HOMEBREW TAPS',
  installable: 'BREW-INSTALLABLE APPLICATIONS & TOOLS',
  restore: 'HOMEBREW RESTORE COMMAND (All-in-one)',
  manual: 'MANUAL INSTALLATIONS WITH OFFICIAL SOURCES',
  metadata: 'SNAPSHOT METADATA',
} as const;

const RULE = '='.repeat(80);

export interface SnapshotInput {
  brewState: BrewState;
  /** Commands from the resolver's installable bucket. */
  installable: string[];
  manual: EnrichedFile['unresolved'];
}

export interface SnapshotOptions {
  brewState: string;
  resolved: string;
  enriched: string;
  output: string;
  now?: Date;
}

export interface SnapshotSummary {
  taps: number;
  installable: number;
  manual: number;
}

const pad = (value: number): string => String(value).padStart(2, '0');

/** Local time as `YYYY-MM-DD HH:MM:SS`. */
export const formatTimestamp = (date: Date): string =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
  `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;

const section = (title: string): string[] => ['', RULE, title, RULE];

export const renderRestoreCommands = (state: BrewState): string[] => {
  const commands: string[] = [];
  if (state.formulae.length > 0) {
    commands.push(`brew install ${state.formulae.join(' ')}`);
  }
  if (state.casks.length > 0) {
    commands.push(`brew install --cask ${state.casks.join(' ')}`);
  }
  return commands;
};

export const renderSnapshot = (input: SnapshotInput, generatedAt: Date): string => {
  const timestamp = formatTimestamp(generatedAt);
  const lines = [
    RULE,
    '                              App Resolver Snapshot',
    RULE,
    `Snapshot Schema Version: ${SNAPSHOT_SCHEMA_VERSION}`,
    `Generated: ${timestamp}`,
  ];

  lines.push(...section(SNAPSHOT_SECTIONS.taps));
  if (input.brewState.taps.length > 0) {
    lines.push(...input.brewState.taps);
  } else {
    lines.push('(No taps found)');
  }

  lines.push(...section(SNAPSHOT_SECTIONS.installable));
  if (input.installable.length > 0) {
    lines.push(...input.installable.map((command) => `  ${command}`));
  } else {
    lines.push('(No brew-installable apps found)');
  }

  lines.push(...section(SNAPSHOT_SECTIONS.restore));
  const restore = renderRestoreCommands(input.brewState);
  lines.push(...(restore.length > 0 ? restore : ['(No brew packages or casks to install)']));

  lines.push(...section(SNAPSHOT_SECTIONS.manual));
  if (input.manual.length > 0) {
    for (const item of input.manual) {
      lines.push(
        '',
        item.app ?? 'Unknown',
        `  Source: ${item.official_download_url ?? 'Not found'}`,
        `  Confidence: ${item.confidence ?? 'low'}`
      );
    }
  } else {
    lines.push('(No unresolved applications)');
  }

  lines.push(...section(SNAPSHOT_SECTIONS.metadata), `Generated: ${timestamp}`, RULE);
  return `${lines.join('\n')}\n`;
};

/**
 * Parsed JSON input for the snapshot. Missing, malformed or mis-shaped files
 * render as empty sections.
 */
const loadDocument = async <T>(
  filePath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T> => {
  const empty = schema.parse({});
  const text = await readTextIfExists(filePath);
  if (text === null) {
    log.info({ file: filePath }, 'Snapshot input not found, rendering it as empty');
    return empty;
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    log.warn({ err, file: filePath }, 'Snapshot input is not valid JSON, rendering it as empty');
    return empty;
  }

  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    log.warn({ file: filePath, issues: parsed.error.issues }, 'Snapshot input has an unexpected shape, rendering it as empty');
    return empty;
  }
  return parsed.data;
};

export const runSnapshot = async (options: SnapshotOptions): Promise<SnapshotSummary> => {
  const brewState = await loadDocument(options.brewState, brewStateSchema);
  const resolved = await loadDocument(options.resolved, installableFileSchema);
  const enriched = await loadDocument(options.enriched, enrichedFileSchema);

  const installable = resolved.brew_installable
    .map((item) => item.command ?? '')
    .filter((command) => command.length > 0);

  const text = renderSnapshot(
    { brewState, installable, manual: enriched.unresolved },
    options.now ?? new Date()
  );
  await writeTextFile(options.output, text);

  const summary: SnapshotSummary = {
    taps: brewState.taps.length,
    installable: installable.length,
    manual: enriched.unresolved.length,
  };
  log.info({ ...summary, output: options.output }, 'Snapshot written');
  return summary;
};
