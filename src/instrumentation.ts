/**
 * Next.js instrumentation フック
 *
 * @description SENTRY_DSN が設定されている場合のみサーバー側で Sentry を初期化
 */

export async function register(): Promise<void> {
  if (process.env.NEXT_RUNTIME === 'nodejs' && process.env.SENTRY_DSN) {
    const Sentry = await import('@sentry/nextjs');
    Sentry.init({
      dsn: process.env.SENTRY_DSN,
      tracesSampleRate: 0,
      environment: process.env.NODE_ENV,
    });
  }
}
