import chalk from 'chalk';
import { describeError, SNAPSHOT_SCHEMA_VERSION, verifySnapshotFile } from '../../../src';

export const verify = async (snapshotFile: string): Promise<void> => {
  try {
    const result = await verifySnapshotFile(snapshotFile);

    if (!result.valid) {
      console.error(chalk.red(`[ERROR] ${result.error ?? 'Invalid snapshot'}`));
      process.exit(1);
    }

    console.log(chalk.green(`[OK] Snapshot conforms to Schema v${SNAPSHOT_SCHEMA_VERSION}`));
    console.log(chalk.dim(`  Sections: ${result.sections.join(', ')}`));
  } catch (e) {
    console.error(chalk.red(`[ERROR] ${describeError(e)}`));
    process.exit(1);
  }
};
