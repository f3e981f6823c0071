/**
 * ダッシュボードのクエリパラメータ
 *
 * @description ?from=2021&to=2024&series=unemployment_rate,avg_weekly_hours
 */

import { z } from 'zod';

type SearchParams = Record<string, string | string[] | undefined>;

const firstValue = (v: unknown) => (Array.isArray(v) ? v[0] : v);

const optionalYear = z.preprocess(
  (v) => {
    const s = firstValue(v);
    return typeof s === 'string' && s.trim() !== '' ? s : undefined;
  },
  z.coerce.number().int().min(1900).max(2999).optional()
);

export const DashboardQuerySchema = z.object({
  from: optionalYear.catch(undefined),
  to: optionalYear.catch(undefined),
  series: z
    .preprocess((v) => {
      // チェックボックスからは ?series=a&series=b の配列で届く
      const s = Array.isArray(v) ? v.join(',') : v;
      if (typeof s !== 'string' || s.trim() === '') {
        return undefined;
      }
      return s.split(',').map((k) => k.trim()).filter(Boolean);
    }, z.array(z.string()).optional())
    .catch(undefined),
});

export interface DashboardQuery {
  from?: number;
  to?: number;
  /** 未指定なら全系列 */
  series?: string[];
}

/**
 * 不正な値は無視して未指定扱いにする
 */
export function parseDashboardQuery(searchParams: SearchParams): DashboardQuery {
  const parsed = DashboardQuerySchema.parse(searchParams);
  return {
    ...(parsed.from !== undefined ? { from: parsed.from } : {}),
    ...(parsed.to !== undefined ? { to: parsed.to } : {}),
    ...(parsed.series !== undefined ? { series: parsed.series } : {}),
  };
}
