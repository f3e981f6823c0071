import { describe, it, expect } from 'vitest';
import {
  filterBySeries,
  filterByYearRange,
  formatMetric,
  formatMonthYear,
  getYearBounds,
  latestObservations,
  pivotWide,
  resolveYearRange,
  toWideCsv,
} from '@/lib/dashboard/transform';
import type { Observation } from '@/lib/store/types';

const rows: Observation[] = [
  { date: '2019-12-01', series: 'unemployment_rate', value: 3.6 },
  { date: '2020-01-01', series: 'unemployment_rate', value: 3.5 },
  { date: '2020-01-01', series: 'avg_weekly_hours', value: 34.3 },
  { date: '2023-06-01', series: 'unemployment_rate', value: 3.6 },
  { date: '2024-03-01', series: 'nonfarm_employment', value: 158155 },
  { date: '2024-03-01', series: 'unemployment_rate', value: 3.9 },
];

describe('dashboard/transform.ts', () => {
  describe('filterByYearRange', () => {
    it('両端の年を含む', () => {
      expect(filterByYearRange(rows, 2020, 2023).map((r) => r.date)).toEqual([
        '2020-01-01',
        '2020-01-01',
        '2023-06-01',
      ]);
    });

    it('範囲外のみなら空', () => {
      expect(filterByYearRange(rows, 2021, 2022)).toEqual([]);
    });
  });

  describe('filterBySeries', () => {
    it('指定キーの行のみ', () => {
      const filtered = filterBySeries(rows, ['avg_weekly_hours', 'nonfarm_employment']);
      expect(filtered.map((r) => r.series)).toEqual(['avg_weekly_hours', 'nonfarm_employment']);
    });

    it('空指定なら空', () => {
      expect(filterBySeries(rows, [])).toEqual([]);
    });
  });

  describe('getYearBounds', () => {
    it('最小・最大年', () => {
      expect(getYearBounds(rows)).toEqual({ min: 2019, max: 2024 });
    });

    it('行がなければ null', () => {
      expect(getYearBounds([])).toBeNull();
    });
  });

  describe('resolveYearRange', () => {
    const bounds = { min: 2019, max: 2024 };

    it('指定なしなら全期間', () => {
      expect(resolveYearRange(bounds, {})).toEqual({ from: 2019, to: 2024 });
    });

    it('defaultYears 指定時は直近N年', () => {
      expect(resolveYearRange(bounds, {}, 3)).toEqual({ from: 2022, to: 2024 });
      expect(resolveYearRange(bounds, {}, 10)).toEqual({ from: 2019, to: 2024 });
    });

    it('データ範囲外の指定は丸める', () => {
      expect(resolveYearRange(bounds, { from: 2000, to: 2030 })).toEqual({ from: 2019, to: 2024 });
    });

    it('from > to は入れ替える', () => {
      expect(resolveYearRange(bounds, { from: 2023, to: 2020 })).toEqual({ from: 2020, to: 2023 });
    });

    it('1年分のみのデータ', () => {
      expect(resolveYearRange({ min: 2024, max: 2024 }, { from: 2020 })).toEqual({ from: 2024, to: 2024 });
    });
  });

  describe('latestObservations', () => {
    it('最新日付の全系列値', () => {
      expect(latestObservations(rows)).toEqual({
        date: '2024-03-01',
        values: { nonfarm_employment: 158155, unemployment_rate: 3.9 },
      });
    });

    it('行がなければ null', () => {
      expect(latestObservations([])).toBeNull();
    });
  });

  describe('pivotWide', () => {
    it('1日付1行・列はキー順', () => {
      const table = pivotWide([rows[2], rows[1], rows[0]]);

      expect(table.columns).toEqual(['avg_weekly_hours', 'unemployment_rate']);
      expect(table.rows).toEqual([
        { date: '2019-12-01', values: { unemployment_rate: 3.6 } },
        { date: '2020-01-01', values: { avg_weekly_hours: 34.3, unemployment_rate: 3.5 } },
      ]);
    });
  });

  describe('toWideCsv', () => {
    it('ヘッダーは Date + 5系列ラベル（キー順）、欠損は空欄', () => {
      const csv = toWideCsv([rows[1], rows[2]]);

      expect(csv.split('\n')).toEqual([
        'Date,Average Hourly Earnings ($),Average Weekly Hours,Labor Force Participation Rate (%),Nonfarm Employment (Thousands),Unemployment Rate (%)',
        '2020-01-01,,34.3,,,3.5',
        '',
      ]);
    });

    it('未登録系列はキー名の列として末尾に追加', () => {
      const csv = toWideCsv([{ date: '2024-01-01', series: 'custom_series', value: 1.25 }]);
      const [header, line] = csv.split('\n');

      expect(header.endsWith(',Unemployment Rate (%),custom_series')).toBe(true);
      expect(line).toBe('2024-01-01,,,,,,1.25');
    });

    it('行がなければヘッダーのみ', () => {
      expect(toWideCsv([]).split('\n')).toHaveLength(2);
    });
  });

  describe('formatMetric', () => {
    it('integer は桁区切り・小数なし', () => {
      expect(formatMetric(158155, 'integer')).toBe('158,155');
      expect(formatMetric(1234.6, 'integer')).toBe('1,235');
    });

    it('decimal1 は小数1桁', () => {
      expect(formatMetric(3.9, 'decimal1')).toBe('3.9');
      expect(formatMetric(34, 'decimal1')).toBe('34.0');
    });
  });

  describe('formatMonthYear', () => {
    it('YYYY-MM-DD → Month YYYY', () => {
      expect(formatMonthYear('2024-03-01')).toBe('March 2024');
      expect(formatMonthYear('2020-12-01')).toBe('December 2020');
    });
  });
});
