/**
 * データセットのマージ
 *
 * @description 既存行と新規取得行を (date, series) で重複排除し、新規側を優先する。
 * 結果は date → series の昇順
 */

import type { Observation } from './types';

function identityKey(obs: Observation): string {
  return `${obs.date}|${obs.series}`;
}

/**
 * date → series の昇順比較（どちらも文字列の辞書順）
 */
export function compareObservations(a: Observation, b: Observation): number {
  if (a.date !== b.date) {
    return a.date < b.date ? -1 : 1;
  }
  if (a.series !== b.series) {
    return a.series < b.series ? -1 : 1;
  }
  return 0;
}

/**
 * 既存データと新規データを統合
 *
 * 同じ識別キーの行は後勝ち（新規取得値で既存値を上書き）
 */
export function mergeObservations(
  existing: readonly Observation[],
  incoming: readonly Observation[]
): Observation[] {
  const byKey = new Map<string, Observation>();

  for (const obs of existing) {
    byKey.set(identityKey(obs), obs);
  }
  for (const obs of incoming) {
    byKey.set(identityKey(obs), obs);
  }

  return [...byKey.values()].sort(compareObservations);
}
