/**
 * 横持ち CSV エクスポート
 *
 * GET /api/export
 * 1日付1行・1系列1列（表示ラベル）の CSV を添付ファイルとして返す
 */

import path from 'path';
import { NextResponse } from 'next/server';
import { loadConfig } from '@/lib/config/env';
import { loadDashboardDataset } from '@/lib/dashboard/dataset';
import { toWideCsv } from '@/lib/dashboard/transform';
import { createLogger } from '@/lib/utils/logger';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

const EXPORT_FILE_NAME = 'bls_data_clean.csv';

const logger = createLogger({ module: 'route/export' });

export async function GET(): Promise<Response> {
  const config = loadConfig();
  const dataset = await loadDashboardDataset(path.resolve(process.cwd(), config.dataPath));

  if (dataset.status === 'error') {
    return NextResponse.json(
      { error: 'Dataset could not be read' },
      { status: 503 }
    );
  }

  const csv = toWideCsv(dataset.rows);
  logger.info('Exporting wide CSV', { rowCount: dataset.rows.length });

  return new Response(csv, {
    status: 200,
    headers: {
      'Content-Type': 'text/csv; charset=utf-8',
      'Content-Disposition': `attachment; filename="${EXPORT_FILE_NAME}"`,
      'Cache-Control': 'no-store',
    },
  });
}
