/**
 * store/dataset-store.ts / store/csv.ts のユニットテスト
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { parseCsvLines, formatCsvField, formatCsvRow } from '@/lib/store/csv';
import {
  DatasetCorruptError,
  parseDatasetCsv,
  readDataset,
  serializeDataset,
  writeDataset,
} from '@/lib/store/dataset-store';
import type { Observation } from '@/lib/store/types';

describe('store/csv.ts', () => {
  it('ダブルクォートとエスケープを解釈する', () => {
    expect(parseCsvLines('a,"b,c","d ""e"""\n')).toEqual([['a', 'b,c', 'd "e"']]);
  });

  it('BOM・CRLF・空行を無視する', () => {
    expect(parseCsvLines('\uFEFFdate,series\r\n\r\n2024-01-01,x\r\n')).toEqual([
      ['date', 'series'],
      ['2024-01-01', 'x'],
    ]);
  });

  it('必要な場合のみクォートする', () => {
    expect(formatCsvField('plain')).toBe('plain');
    expect(formatCsvField('a,b')).toBe('"a,b"');
    expect(formatCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(formatCsvRow(['2024-03-01', 'unemployment_rate', 3.9])).toBe(
      '2024-03-01,unemployment_rate,3.9'
    );
  });
});

describe('store/dataset-store.ts', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'bls-store-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('parseDatasetCsv', () => {
    it('3列 CSV を観測値に変換する', () => {
      const rows = parseDatasetCsv(
        'date,series,value\n2024-03-01,unemployment_rate,3.9\n2024-03-01,nonfarm_employment,158000.0\n'
      );
      expect(rows).toEqual([
        { date: '2024-03-01', series: 'unemployment_rate', value: 3.9 },
        { date: '2024-03-01', series: 'nonfarm_employment', value: 158000 },
      ]);
    });

    it('時刻つきの日付を日付部分に正規化する', () => {
      const rows = parseDatasetCsv('date,series,value\n2020-01-01 00:00:00,avg_weekly_hours,34.3\n');
      expect(rows).toEqual([{ date: '2020-01-01', series: 'avg_weekly_hours', value: 34.3 }]);
    });

    it('空のテキストは空配列', () => {
      expect(parseDatasetCsv('')).toEqual([]);
    });

    it('ヘッダーのみは空配列', () => {
      expect(parseDatasetCsv('date,series,value\n')).toEqual([]);
    });

    it('未登録の系列キーもそのまま保持する', () => {
      const rows = parseDatasetCsv('date,series,value\n2019-05-01,legacy_series,1.5\n');
      expect(rows[0].series).toBe('legacy_series');
    });

    it('ヘッダー不一致は DatasetCorruptError', () => {
      expect(() => parseDatasetCsv('Date,Value\n2024-01-01,1\n')).toThrow(DatasetCorruptError);
    });

    it('列数不一致は DatasetCorruptError', () => {
      expect(() => parseDatasetCsv('date,series,value\n2024-01-01,x\n')).toThrow(
        'line 2 has 2 columns'
      );
    });

    it('存在しない日付は DatasetCorruptError', () => {
      expect(() => parseDatasetCsv('date,series,value\n2024-02-30,x,1\n')).toThrow(
        'line 2 has invalid date "2024-02-30"'
      );
    });

    it('数値でない値は DatasetCorruptError', () => {
      expect(() => parseDatasetCsv('date,series,value\n2024-02-01,x,abc\n')).toThrow(
        'line 2 has invalid value "abc"'
      );
    });
  });

  describe('serializeDataset', () => {
    it('ヘッダーつきで並び順のまま出力する', () => {
      const csv = serializeDataset([
        { date: '2024-01-01', series: 'b', value: 2 },
        { date: '2024-01-01', series: 'a', value: 1.25 },
      ]);
      expect(csv).toBe('date,series,value\n2024-01-01,b,2\n2024-01-01,a,1.25\n');
    });
  });

  describe('readDataset / writeDataset', () => {
    it('ファイルがなければ null', async () => {
      expect(await readDataset(path.join(dir, 'missing.csv'))).toBeNull();
    });

    it('ディレクトリを作成して書き込む', async () => {
      const filePath = path.join(dir, 'nested', 'data', 'bls_data.csv');
      const written = await writeDataset(filePath, [
        { date: '2024-03-01', series: 'unemployment_rate', value: 3.9 },
      ]);

      expect(written).toBe(1);
      expect(await fs.readFile(filePath, 'utf-8')).toBe(
        'date,series,value\n2024-03-01,unemployment_rate,3.9\n'
      );
    });

    it('一時ファイルを残さない', async () => {
      const filePath = path.join(dir, 'bls_data.csv');
      await writeDataset(filePath, []);

      expect(await fs.readdir(dir)).toEqual(['bls_data.csv']);
    });

    it('書いた内容をそのまま読み戻せる', async () => {
      const filePath = path.join(dir, 'bls_data.csv');
      const rows: Observation[] = [
        { date: '2020-01-01', series: 'avg_hourly_earnings', value: 28.44 },
        { date: '2020-01-01', series: 'nonfarm_employment', value: 152212 },
        { date: '2020-02-01', series: 'labor_force_participation', value: 63.3 },
        { date: '2020-02-01', series: 'unemployment_rate', value: 0.1 + 0.2 },
      ];

      await writeDataset(filePath, rows);

      expect(await readDataset(filePath)).toEqual(rows);
    });

    it('既存ファイルを全件置き換える', async () => {
      const filePath = path.join(dir, 'bls_data.csv');
      await writeDataset(filePath, [
        { date: '2020-01-01', series: 'a', value: 1 },
        { date: '2020-02-01', series: 'a', value: 2 },
      ]);
      await writeDataset(filePath, [{ date: '2020-03-01', series: 'a', value: 3 }]);

      expect(await readDataset(filePath)).toEqual([{ date: '2020-03-01', series: 'a', value: 3 }]);
    });

    it('rename 失敗時は一時ファイルの削除に失敗しても元のエラーを送出する', async () => {
      const filePath = path.join(dir, 'bls_data.csv');
      vi.spyOn(fs, 'rename').mockRejectedValueOnce(new Error('EXDEV: cross-device link not permitted'));
      vi.spyOn(fs, 'rm').mockRejectedValueOnce(new Error('EPERM: operation not permitted'));
      vi.spyOn(console, 'warn').mockImplementation(() => {});

      await expect(
        writeDataset(filePath, [{ date: '2020-01-01', series: 'a', value: 1 }])
      ).rejects.toThrow('EXDEV: cross-device link not permitted');
      expect(fs.rm).toHaveBeenCalledWith(`${filePath}.${process.pid}.tmp`, { force: true });
    });

    it('rename 失敗時は一時ファイルを残さない', async () => {
      const filePath = path.join(dir, 'bls_data.csv');
      vi.spyOn(fs, 'rename').mockRejectedValueOnce(new Error('EXDEV: cross-device link not permitted'));

      await expect(writeDataset(filePath, [])).rejects.toThrow('EXDEV');
      expect(await fs.readdir(dir)).toEqual([]);
    });

    it('壊れたファイルは DatasetCorruptError', async () => {
      const filePath = path.join(dir, 'bls_data.csv');
      await fs.writeFile(filePath, 'not,a,dataset\n1,2,3\n');

      await expect(readDataset(filePath)).rejects.toBeInstanceOf(DatasetCorruptError);
    });

    it('ディレクトリを指すパスは DatasetCorruptError', async () => {
      await expect(readDataset(dir)).rejects.toBeInstanceOf(DatasetCorruptError);
    });
  });
});
