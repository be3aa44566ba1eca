import * as fs from 'fs/promises';
import * as path from 'path';
import { PipelineError } from './errors';

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

/** Reads a UTF-8 file, or returns null when nothing exists at `filePath`. */
export const readTextIfExists = async (filePath: string): Promise<string | null> => {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }
    throw error;
  }
};

/**
 * Writes `text` to a sibling temp file first and renames it over `filePath`,
 * so the destination is either the complete document or untouched.
 */
export const writeTextFile = async (filePath: string, text: string): Promise<void> => {
  const resolvedPath = path.resolve(filePath);
  const tempPath = path.join(
    path.dirname(resolvedPath),
    `.${path.basename(resolvedPath)}.${process.pid}.tmp`
  );

  try {
    await fs.writeFile(tempPath, text, 'utf8');
    await fs.rename(tempPath, resolvedPath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw new PipelineError('OUTPUT_WRITE_FAILED', `Failed to write ${filePath}`, { cause: error });
  }
};

/** Two-space indented JSON, no trailing newline. */
export const writeJsonFile = (filePath: string, value: unknown): Promise<void> =>
  writeTextFile(filePath, JSON.stringify(value, null, 2));
