import { describeError } from '../errors/DocumentError';
import { createLogger } from '../utils/logger';

export interface BatchFailure {
  path: string;
  error: unknown;
}

export interface BatchResult {
  converted: string[];
  failed: BatchFailure[];
}

const logger = createLogger('batch');

/**
 * Convert files one after another. A failing file is logged and skipped;
 * the rest still run.
 */
export async function convertEach(
  paths: string[],
  convert: (path: string) => Promise<unknown>
): Promise<BatchResult> {
  const result: BatchResult = { converted: [], failed: [] };

  for (const path of paths) {
    try {
      await convert(path);
      result.converted.push(path);
    } catch (error) {
      logger.error(`${path}: ${describeError(error)}`);
      result.failed.push({ path, error });
    }
  }

  logger.info(`processed ${result.converted.length} files.`);
  return result;
}
