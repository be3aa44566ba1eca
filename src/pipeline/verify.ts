import { PipelineError } from '../utils/errors';
import { readTextIfExists } from '../utils/fs';
import { SNAPSHOT_SCHEMA_VERSION, SNAPSHOT_SECTIONS } from './snapshot';

const VERSION_HEADER = `Snapshot Schema Version: ${SNAPSHOT_SCHEMA_VERSION}`;

// Lines that count as canonical sections when matched exactly.
export const CANONICAL_SECTIONS: readonly string[] = [
  SNAPSHOT_SECTIONS.taps,
  'HOMEBREW RESTORE COMMAND',
  SNAPSHOT_SECTIONS.manual,
];

export interface SnapshotVerification {
  valid: boolean;
  sections: string[];
  error?: string;
}

export const verifySnapshot = (text: string): SnapshotVerification => {
  const lines = text.split('\n');

  if (!lines.some((line) => line.startsWith(VERSION_HEADER))) {
    return {
      valid: false,
      sections: [],
      error: `Snapshot missing or invalid schema version (expected: ${VERSION_HEADER})`,
    };
  }

  const sections = lines.filter((line) => CANONICAL_SECTIONS.includes(line));
  if (sections.length === 0) {
    return { valid: false, sections, error: 'No valid snapshot sections found' };
  }
  return { valid: true, sections };
};

export const verifySnapshotFile = async (filePath: string): Promise<SnapshotVerification> => {
  const text = await readTextIfExists(filePath);
  if (text === null) {
    throw new PipelineError('SNAPSHOT_NOT_FOUND', `File not found: ${filePath}`);
  }
  return verifySnapshot(text);
};
