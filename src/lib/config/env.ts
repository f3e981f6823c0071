/**
 * 環境変数の読み込みとバリデーション
 *
 * @description パイプライン / ダッシュボード共通の設定値。
 * モジュールレベルの定数ではなく、呼び出し側で取得して各コンポーネントに渡す
 */

import { z } from 'zod';

/** デフォルトの保存先（プロジェクトルートからの相対パス） */
export const DEFAULT_DATA_PATH = 'data/bls_data.csv';

/** デフォルトの取得開始年 */
export const DEFAULT_START_YEAR = 2020;

/**
 * 設定エラー
 */
export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/** 空文字は未設定として扱う */
const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const optionalPositiveInt = optionalString.pipe(
  z.coerce.number().int().positive().optional()
);

export const EnvSchema = z.object({
  BLS_DATA_PATH: optionalString.transform((v) => v ?? DEFAULT_DATA_PATH),
  BLS_START_YEAR: optionalString.pipe(
    z.coerce.number().int().min(1900).max(2999).default(DEFAULT_START_YEAR)
  ),
  BLS_API_KEY: optionalString,
  BLS_TIMEOUT_MS: optionalString.pipe(z.coerce.number().int().positive().default(30000)),
  DASHBOARD_DEFAULT_YEARS: optionalPositiveInt,
});

export interface AppConfig {
  /** CSV 保存先 */
  dataPath: string;
  /** 取得開始年 */
  startYear: number;
  /** BLS 登録キー（任意） */
  blsApiKey?: string;
  /** リクエストタイムアウト（ミリ秒） */
  blsTimeoutMs: number;
  /** ダッシュボードの初期表示年数（未指定時は全期間） */
  dashboardDefaultYears?: number;
}

/**
 * 環境変数から設定を読み込む
 *
 * @throws {ConfigError} 値が不正な場合
 */
export function loadConfig(env: Partial<NodeJS.ProcessEnv> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const data = parsed.data;
  return {
    dataPath: data.BLS_DATA_PATH,
    startYear: data.BLS_START_YEAR,
    blsApiKey: data.BLS_API_KEY,
    blsTimeoutMs: data.BLS_TIMEOUT_MS,
    dashboardDefaultYears: data.DASHBOARD_DEFAULT_YEARS,
  };
}
