import { vi, beforeEach, afterEach } from 'vitest';

(process.env as Record<string, string>).NODE_ENV = 'test';

// 通知はテストで送らない
delete process.env.RESEND_API_KEY;
delete process.env.ALERT_EMAIL_TO;

beforeEach(() => {
  vi.clearAllMocks();

  // console出力を抑制（warn/error 以外）
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'info').mockImplementation(() => {});
  vi.spyOn(console, 'debug').mockImplementation(() => {});
});

afterEach(() => {
  vi.useRealTimers();
});
