/**
 * BLS データセット更新ジョブ
 *
 * @description レジストリの全系列を順番に取得し、既存 CSV とマージして全件書き換える。
 * 系列単位の失敗は記録して続行し、ストアの読み書き失敗のみ致命的エラーとする
 */

import { randomUUID } from 'crypto';
import { BLS_SERIES, type SeriesRegistry } from '../bls/series-config';
import { createJobLogger } from '../utils/logger';
import { sendJobFailureEmail } from '../notification/email';
import { readDataset, writeDataset } from '../store/dataset-store';
import { mergeObservations } from '../store/merge';
import type { Observation } from '../store/types';
import { fetchSeriesPoints, type SeriesPointSource } from './fetch-series';

export const JOB_NAME = 'bls-update';

export interface UpdateDatasetOptions {
  /** CSV 保存先 */
  dataPath: string;
  /** 取得元クライアント */
  client: SeriesPointSource;
  /** 系列レジストリ（デフォルト: BLS 5系列） */
  registry?: SeriesRegistry;
  /** 取得開始年（デフォルト: 2020） */
  startYear?: number;
  /** 取得終了年（デフォルト: 今年） */
  endYear?: number;
  /** 実行ID（省略時は生成） */
  runId?: string;
}

export interface SeriesFailure {
  seriesKey: string;
  seriesId: string;
  reason: string;
}

export interface UpdateDatasetResult {
  /** 全系列が失敗した場合のみ false */
  success: boolean;
  runId: string;
  dataPath: string;
  seriesProcessed: number;
  /** 今回取得した行数 */
  fetchedRows: number;
  /** マージ前の既存行数 */
  existingRows: number;
  /** 書き込んだ行数 */
  rowsWritten: number;
  skippedValues: number;
  failures: SeriesFailure[];
}

/**
 * データセットを更新
 *
 * @throws {DatasetCorruptError} 既存ストアが読めない場合
 * @throws 書き込みに失敗した場合はそのまま伝播
 */
export async function updateDataset(options: UpdateDatasetOptions): Promise<UpdateDatasetResult> {
  const {
    dataPath,
    client,
    registry = BLS_SERIES,
    startYear = 2020,
    endYear = new Date().getFullYear(),
    runId = randomUUID(),
  } = options;

  const logger = createJobLogger(JOB_NAME, runId);
  const timer = logger.startTimer('BLS dataset update');

  if (startYear > endYear) {
    throw new RangeError(`startYear (${startYear}) must not be after endYear (${endYear})`);
  }

  logger.info('Starting BLS dataset update', {
    dataPath,
    startYear,
    endYear,
    seriesCount: registry.length,
  });

  const incoming: Observation[] = [];
  const failures: SeriesFailure[] = [];
  let skippedValues = 0;

  try {
    // 1系列ずつ逐次取得
    for (const series of registry) {
      logger.info(`Fetching ${series.key} from ${startYear}-${endYear}`, {
        seriesKey: series.key,
        seriesId: series.seriesId,
      });

      const result = await fetchSeriesPoints(client, series, startYear, endYear, logger);

      if (!result.ok) {
        failures.push({ seriesKey: series.key, seriesId: series.seriesId, reason: result.reason });
        continue;
      }

      skippedValues += result.skippedCount;
      for (const point of result.points) {
        incoming.push({ date: point.date, series: series.key, value: point.value });
      }
    }

    const existing = (await readDataset(dataPath)) ?? [];
    const merged = mergeObservations(existing, incoming);
    const rowsWritten = await writeDataset(dataPath, merged);

    const result: UpdateDatasetResult = {
      success: registry.length === 0 || failures.length < registry.length,
      runId,
      dataPath,
      seriesProcessed: registry.length,
      fetchedRows: incoming.length,
      existingRows: existing.length,
      rowsWritten,
      skippedValues,
      failures,
    };

    timer.end({
      rowCount: rowsWritten,
      fetchedRows: result.fetchedRows,
      existingRows: result.existingRows,
      skippedValues,
      failedSeries: failures.map((f) => f.seriesKey),
    });
    logger.info(`Saved ${rowsWritten} rows to ${dataPath}`);

    if (!result.success) {
      await notifyFailure(runId, `All ${registry.length} series failed to fetch`, failures);
    }

    return result;
  } catch (error) {
    timer.endWithError(error, { dataPath });
    const message = error instanceof Error ? error.message : String(error);
    await notifyFailure(runId, message, failures);
    throw error;
  }
}

async function notifyFailure(
  runId: string,
  message: string,
  failures: SeriesFailure[]
): Promise<void> {
  await sendJobFailureEmail({
    jobName: JOB_NAME,
    runId,
    error: message,
    timestamp: new Date(),
    failures: failures.map((f) => `${f.seriesKey} (${f.seriesId}): ${f.reason}`),
  });
}
