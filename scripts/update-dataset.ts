/**
 * BLS データセット更新スクリプト
 *
 * @description 定期実行（GH Actions / cron）から引数なしで呼び出すバッチ
 * - CLI引数（任意）: --start-year=YYYY
 * - 環境変数は .env.local または実行環境から読み込む
 *
 * @example
 * ```
 * npm run update-data
 * npm run update-data -- --start-year=2015
 * ```
 */

import { config } from 'dotenv';
import { resolve } from 'path';
import { loadConfig } from '../src/lib/config/env';
import { createBlsClient } from '../src/lib/bls/client';
import { updateDataset } from '../src/lib/pipeline/update-dataset';
import { createLogger } from '../src/lib/utils/logger';

const logger = createLogger({ module: 'update-dataset' });

/**
 * CLI 引数をパース
 */
function parseArgs(): { startYear?: number } {
  let startYear: number | undefined;

  for (const arg of process.argv.slice(2)) {
    if (arg.startsWith('--start-year=')) {
      const raw = arg.slice('--start-year='.length);
      const value = Number(raw);
      if (!Number.isInteger(value) || value < 1900) {
        throw new Error(`Invalid --start-year: ${raw}. Expected a four-digit year.`);
      }
      startYear = value;
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return { startYear };
}

async function main(): Promise<void> {
  config({ path: resolve(process.cwd(), '.env.local') });

  const args = parseArgs();
  const appConfig = loadConfig();
  const dataPath = resolve(process.cwd(), appConfig.dataPath);

  const client = createBlsClient({
    apiKey: appConfig.blsApiKey,
    timeoutMs: appConfig.blsTimeoutMs,
  });

  const result = await updateDataset({
    dataPath,
    client,
    startYear: args.startYear ?? appConfig.startYear,
  });

  const output = {
    success: result.success,
    runId: result.runId,
    dataPath: result.dataPath,
    seriesProcessed: result.seriesProcessed,
    fetchedRows: result.fetchedRows,
    rowsWritten: result.rowsWritten,
    skippedValues: result.skippedValues,
    failures: result.failures.length > 0 ? result.failures : undefined,
  };

  console.log(JSON.stringify(output, null, 2));
  console.log(`Saved ${result.rowsWritten} rows to ${result.dataPath}`);

  if (!result.success) {
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  logger.error('Script failed', { error });
  process.exitCode = 1;
});
