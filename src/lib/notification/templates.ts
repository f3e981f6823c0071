/**
 * メールテンプレート
 *
 * @description ジョブ失敗通知用の HTML メールテンプレート
 */

import type { JobFailureNotification } from './email';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#039;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

const CELL_LABEL = 'padding: 12px; border-bottom: 1px solid #e5e7eb; font-weight: bold; width: 140px;';
const CELL_VALUE = 'padding: 12px; border-bottom: 1px solid #e5e7eb;';

function row(label: string, valueHtml: string): string {
  return `
    <tr>
      <td style="${CELL_LABEL}">${label}</td>
      <td style="${CELL_VALUE}">${valueHtml}</td>
    </tr>`;
}

/**
 * 失敗通知メールテンプレート
 */
export function getJobFailureEmailTemplate(
  data: JobFailureNotification
): { subject: string; html: string } {
  const timestamp = data.timestamp.toISOString();
  const subject = `[ALERT] ${data.jobName} failed - ${timestamp.slice(0, 10)}`;

  const failures = data.failures ?? [];
  const failureList = failures.length > 0
    ? `<ul style="margin: 0; padding-left: 20px;">${failures
        .map((f) => `<li>${escapeHtml(f)}</li>`)
        .join('')}</ul>`
    : 'なし';

  const html = `
<!DOCTYPE html>
<html lang="ja">
<head>
  <meta charset="UTF-8">
  <title>ジョブ失敗通知</title>
</head>
<body style="font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; line-height: 1.6; color: #333; max-width: 600px; margin: 0 auto; padding: 20px;">
  <div style="background-color: #fef2f2; border: 1px solid #fecaca; border-radius: 8px; padding: 20px; margin-bottom: 20px;">
    <h1 style="color: #dc2626; margin: 0 0 10px 0; font-size: 24px;">ジョブ失敗通知</h1>
    <p style="color: #991b1b; margin: 0;">${escapeHtml(data.jobName)} の実行に失敗しました</p>
  </div>

  <table style="width: 100%; border-collapse: collapse; margin-bottom: 20px;">
    ${row('ジョブ名', escapeHtml(data.jobName))}
    ${row('Run ID', `<code>${escapeHtml(data.runId)}</code>`)}
    ${row('発生時刻', escapeHtml(timestamp))}
    ${row('エラー', `<pre style="white-space: pre-wrap; margin: 0;">${escapeHtml(data.error)}</pre>`)}
    ${row('失敗系列', failureList)}
  </table>
</body>
</html>
`.trim();

  return { subject, html };
}
