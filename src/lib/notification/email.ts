/**
 * メール通知（Resend）
 *
 * @description データセット更新ジョブ失敗時のメール通知
 * @see https://resend.com/docs
 */

import { Resend } from 'resend';
import { createLogger } from '../utils/logger';
import { getJobFailureEmailTemplate } from './templates';

const logger = createLogger({ module: 'email' });

function getResendClient(): Resend | null {
  const apiKey = process.env.RESEND_API_KEY;
  if (!apiKey) {
    return null;
  }
  return new Resend(apiKey);
}

function getAlertEmailTo(): string | null {
  return process.env.ALERT_EMAIL_TO || null;
}

function getEmailFrom(): string {
  return process.env.EMAIL_FROM ?? 'Labor Stats Pipeline <noreply@resend.dev>';
}

export interface JobFailureNotification {
  /** ジョブ名 */
  jobName: string;
  /** 実行ID */
  runId: string;
  /** エラーメッセージ */
  error: string;
  /** 発生時刻 */
  timestamp: Date;
  /** 系列単位の失敗（"key (id): reason"） */
  failures?: string[];
}

/**
 * ジョブ失敗通知メールを送信
 *
 * @returns 送信成功した場合 true。未設定・送信失敗は false（例外は投げない）
 */
export async function sendJobFailureEmail(data: JobFailureNotification): Promise<boolean> {
  const resend = getResendClient();
  const to = getAlertEmailTo();

  if (!resend || !to) {
    logger.info('Email notification skipped (not configured)', { jobName: data.jobName });
    return false;
  }

  const { subject, html } = getJobFailureEmailTemplate(data);

  try {
    const result = await resend.emails.send({
      from: getEmailFrom(),
      to: [to],
      subject,
      html,
    });

    if (result.error) {
      logger.error('Failed to send failure notification email', {
        jobName: data.jobName,
        error: result.error.message,
      });
      return false;
    }

    logger.info('Failure notification email sent', {
      jobName: data.jobName,
      runId: data.runId,
      emailId: result.data?.id,
    });
    return true;
  } catch (error) {
    // 通知失敗はログのみ。ジョブ側のエラーを上書きしない
    logger.error('Error sending failure notification email', {
      jobName: data.jobName,
      error,
    });
    return false;
  }
}
