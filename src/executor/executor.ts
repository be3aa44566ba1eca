import { execFile } from 'child_process';
import { logger } from '../utils/logger';

const log = logger.child({ component: 'executor' });

// Catalog listings run to a few hundred KB.
const MAX_OUTPUT_BYTES = 32 * 1024 * 1024;

/**
 * Execute a command using execFile (no shell) and resolve with its stdout.
 * Rejects when the binary is missing or exits non-zero.
 */
export const executeFile = (command: string, args: string[]): Promise<string> => {
  const commandLine = [command, ...args].join(' ');

  return new Promise((resolve, reject) => {
    execFile(command, args, { encoding: 'utf8', maxBuffer: MAX_OUTPUT_BYTES }, (error, stdout, stderr) => {
      if (error) {
        log.debug({ command: commandLine, stderr }, 'Command failed');
        const detail = stderr.trim() || error.message;
        reject(new Error(`${commandLine} failed: ${detail}`, { cause: error }));
        return;
      }

      log.debug({ command: commandLine, bytes: stdout.length }, 'Command succeeded');
      resolve(stdout);
    });
  });
};
