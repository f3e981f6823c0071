/**
 * U.S. Labor Statistics Dashboard
 *
 * @description 永続化ストア（CSV）を読み取り専用で表示する。
 * GET /?from=2021&to=2024&series=unemployment_rate
 */

import path from 'path';
import type { ReactNode } from 'react';
import { loadConfig } from '@/lib/config/env';
import {
  BLS_SERIES,
  findSeries,
  getSeriesLabel,
  partitionSeriesKeys,
  type SeriesCategory,
  type SeriesKey,
} from '@/lib/bls/series-config';
import { loadDashboardDataset } from '@/lib/dashboard/dataset';
import { parseDashboardQuery } from '@/lib/dashboard/query';
import {
  filterBySeries,
  filterByYearRange,
  formatMetric,
  formatMonthYear,
  getYearBounds,
  latestObservations,
  resolveYearRange,
  type YearBounds,
  type YearRange,
} from '@/lib/dashboard/transform';
import type { Observation } from '@/lib/store/types';
import SeriesChart from '@/components/SeriesChart';
import DashboardTabs, { type DashboardTab } from '@/components/DashboardTabs';

export const dynamic = 'force-dynamic';

/** 上部メトリクスに表示する系列 */
const METRIC_SERIES: readonly SeriesKey[] = ['nonfarm_employment', 'unemployment_rate', 'labor_force_participation'];

const TABS: ReadonlyArray<{ category: SeriesCategory; title: string }> = [
  { category: 'employment', title: 'Employment Level & Status' },
  { category: 'wages_hours', title: 'Wages & Hours' },
  { category: 'utilization', title: 'Labor Utilization' },
];

type PageProps = {
  searchParams: Record<string, string | string[] | undefined>;
};

function Notice({ children }: { children: ReactNode }) {
  return (
    <p
      role="status"
      style={{
        padding: '1rem',
        backgroundColor: '#eff6ff',
        border: '1px solid #bfdbfe',
        borderRadius: '4px',
        color: '#1e40af',
      }}
    >
      {children}
    </p>
  );
}

function renderChart(rows: readonly Observation[], seriesKey: string): ReactNode {
  const series = findSeries(seriesKey);
  const label = getSeriesLabel(seriesKey);
  const points = rows.filter((r) => r.series === seriesKey);

  if (points.length === 0) {
    return (
      <Notice key={seriesKey}>
        No data available for {label} in this year range.
      </Notice>
    );
  }

  return (
    <SeriesChart
      key={seriesKey}
      title={label}
      yLabel={series?.axisLabel}
      points={points.map((p) => ({ date: p.date, value: p.value }))}
    />
  );
}

function Filters({
  bounds,
  range,
  selected,
}: {
  bounds: YearBounds;
  range: YearRange;
  selected: readonly string[];
}) {
  const years: number[] = [];
  for (let y = bounds.min; y <= bounds.max; y++) {
    years.push(y);
  }

  return (
    <form method="get" style={{ display: 'flex', flexWrap: 'wrap', gap: '1rem', alignItems: 'end' }}>
      {bounds.min === bounds.max ? (
        <span>Only data for {bounds.min} is available.</span>
      ) : (
        <>
          <label>
            From{' '}
            <select name="from" defaultValue={range.from}>
              {years.map((y) => <option key={y} value={y}>{y}</option>)}
            </select>
          </label>
          <label>
            To{' '}
            <select name="to" defaultValue={range.to}>
              {years.map((y) => <option key={y} value={y}>{y}</option>)}
            </select>
          </label>
        </>
      )}
      <fieldset style={{ border: 'none', padding: 0, margin: 0 }}>
        {BLS_SERIES.map((s) => (
          <label key={s.key} style={{ marginRight: '0.75rem' }}>
            <input type="checkbox" name="series" value={s.key} defaultChecked={selected.includes(s.key)} />{' '}
            {s.label}
          </label>
        ))}
      </fieldset>
      <button type="submit">Apply</button>
      <a href="/api/export" download="bls_data_clean.csv">Download clean dataset (CSV)</a>
    </form>
  );
}

export default async function DashboardPage({ searchParams }: PageProps) {
  const config = loadConfig();
  const dataset = await loadDashboardDataset(path.resolve(process.cwd(), config.dataPath));
  const bounds = getYearBounds(dataset.rows);

  if (dataset.status !== 'ok' || !bounds) {
    return (
      <main style={{ maxWidth: 1400, margin: '0 auto', padding: '2rem' }}>
        <h1>U.S. Labor Statistics Dashboard</h1>
        <Notice>
          {dataset.status === 'error'
            ? 'The dataset could not be read. Run the update job to rebuild it.'
            : 'No data yet. Run the update job to fetch BLS data.'}
        </Notice>
      </main>
    );
  }

  const query = parseDashboardQuery(searchParams);
  const range = resolveYearRange(bounds, query, config.dashboardDefaultYears);
  const selected: string[] = query.series ?? BLS_SERIES.map((s) => s.key);
  const plotRows = filterBySeries(
    filterByYearRange(dataset.rows, range.from, range.to),
    selected
  );

  const latest = latestObservations(dataset.rows);

  const tabs: DashboardTab[] = TABS.map(({ category, title }) => {
    const keys = BLS_SERIES.filter((s) => s.category === category && selected.includes(s.key)).map((s) => s.key);
    return {
      id: category,
      title,
      content: (
        <div style={{ display: 'grid', gridTemplateColumns: 'repeat(auto-fit, minmax(420px, 1fr))', gap: '1.5rem' }}>
          {keys.length === 0 ? <Notice>No series selected in this group.</Notice> : keys.map((key) => renderChart(plotRows, key))}
          {category === 'utilization' && (
            <aside>
              <strong>What this means (simple explanation):</strong>
              <p>
                The <strong>Labor Force Participation Rate (LFPR)</strong> is the share of the working-age
                population that is either <strong>working</strong> or <strong>actively looking for work</strong>.
              </p>
              <ul>
                <li>If LFPR rises: more people are entering the labor market.</li>
                <li>
                  If LFPR falls: more people are staying out of the labor market (for example, school,
                  retirement, discouragement, caregiving).
                </li>
              </ul>
            </aside>
          )}
        </div>
      ),
    };
  });

  // 旧バージョンで保存された未登録系列（?series= で明示指定した場合のみ）
  const otherKeys = partitionSeriesKeys(selected).unknown;
  if (otherKeys.length > 0) {
    tabs.push({
      id: 'other',
      title: 'Other Series',
      content: (
        <div style={{ display: 'grid', gridTemplateColumns: 'repeat(auto-fit, minmax(420px, 1fr))', gap: '1.5rem' }}>
          {otherKeys.map((key) => renderChart(plotRows, key))}
        </div>
      ),
    });
  }

  return (
    <main style={{ maxWidth: 1400, margin: '0 auto', padding: '2rem' }}>
      <h1>U.S. Labor Statistics Dashboard</h1>
      <p>
        Monthly data from the U.S. Bureau of Labor Statistics (BLS): employment, unemployment, labor force
        participation, wages, and hours.
      </p>
      {latest && (
        <p>
          <strong>Last updated:</strong> {formatMonthYear(latest.date)}
        </p>
      )}

      <div style={{ display: 'grid', gridTemplateColumns: 'repeat(3, 1fr)', gap: '1rem', margin: '1.5rem 0' }}>
        {METRIC_SERIES.map((key) => {
          const series = findSeries(key);
          const value = latest?.values[key];
          if (!series || value === undefined) {
            return <div key={key} />;
          }
          return (
            <div key={key} style={{ padding: '1rem', border: '1px solid #e5e7eb', borderRadius: '8px' }}>
              <div style={{ color: '#6b7280', fontSize: '0.9rem' }}>{series.label}</div>
              <div style={{ fontSize: '2rem', fontWeight: 600 }}>{formatMetric(value, series.format)}</div>
            </div>
          );
        })}
      </div>

      <Filters bounds={bounds} range={range} selected={selected} />
      <hr style={{ margin: '1.5rem 0', border: 'none', borderTop: '1px solid #e5e7eb' }} />

      {plotRows.length === 0 ? (
        <Notice>No data for the selected years and series.</Notice>
      ) : (
        <DashboardTabs tabs={tabs} />
      )}
    </main>
  );
}
