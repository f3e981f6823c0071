/**
 * BLS Public Data API レスポンス型定義
 *
 * @description U.S. Bureau of Labor Statistics 時系列 API (v2) のリクエスト/レスポンス型
 * @see https://www.bls.gov/developers/api_signature_v2.htm
 */

// ============================================
// timeseries/data エンドポイント
// ============================================

/**
 * POST /publicAPI/v2/timeseries/data/ リクエストボディ
 */
export interface BlsTimeseriesRequest {
  seriesid: string[];
  /** 開始年 (YYYY) */
  startyear: string;
  /** 終了年 (YYYY) */
  endyear: string;
  /** 登録キー（任意） */
  registrationkey?: string;
}

/**
 * 1観測値
 */
export interface BlsDatum {
  /** 年 (例: "2024") */
  year: string;
  /** 期間コード (M01〜M12、M13 = 年平均) */
  period: string;
  /** 期間名 (例: "March") */
  periodName: string;
  /** 観測値（文字列、欠損時は "-" など） */
  value: string;
  latest?: string;
  footnotes?: Array<{ code?: string; text?: string | null }>;
}

export interface BlsSeriesData {
  seriesID: string;
  /** 新しい順。要素は BlsDatum 形式だが未検証 */
  data: unknown[];
}

/**
 * timeseries/data レスポンス
 */
export interface BlsTimeseriesResponse {
  /** REQUEST_SUCCEEDED / REQUEST_NOT_PROCESSED / REQUEST_FAILED ... */
  status: string;
  responseTime?: number;
  message?: string[];
  Results?: {
    series?: BlsSeriesData[];
  };
}

// ============================================
// パース済みデータ
// ============================================

/**
 * パース済み観測値（月次のみ、数値変換済み）
 */
export interface ParsedBlsPoint {
  /** 月初日 (YYYY-MM-01) */
  date: string;
  value: number;
}
