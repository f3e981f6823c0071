/**
 * ダッシュボード用データ読み込み
 *
 * @description 永続化ストアを読み取り専用で読み込む。
 * ファイルなし・空・破損はいずれも例外にせず状態として返す
 */

import { readDataset } from '../store/dataset-store';
import type { Observation } from '../store/types';
import { compareObservations } from '../store/merge';
import { createLogger } from '../utils/logger';

const logger = createLogger({ module: 'dashboard-dataset' });

export type DashboardDataset =
  | { status: 'ok'; rows: Observation[] }
  | { status: 'empty'; rows: [] }
  | { status: 'error'; rows: []; message: string };

/**
 * ストアを読み込む（日付昇順）
 */
export async function loadDashboardDataset(dataPath: string): Promise<DashboardDataset> {
  try {
    const rows = await readDataset(dataPath);
    if (!rows || rows.length === 0) {
      return { status: 'empty', rows: [] };
    }
    return { status: 'ok', rows: [...rows].sort(compareObservations) };
  } catch (error) {
    logger.error('Failed to load dataset for dashboard', { dataPath, error });
    return {
      status: 'error',
      rows: [],
      message: error instanceof Error ? error.message : String(error),
    };
  }
}
