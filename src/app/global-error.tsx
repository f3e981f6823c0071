'use client';

import { captureException } from '@sentry/nextjs';
import { useEffect } from 'react';

// ルートレイアウト自体の失敗時に使われるため html/body を自前で描画する
export default function GlobalError({
  error,
  reset,
}: {
  error: Error & { digest?: string };
  reset: () => void;
}) {
  useEffect(() => {
    captureException(error);
  }, [error]);

  return (
    <html lang="en">
      <body style={{ fontFamily: 'sans-serif' }}>
        <main style={{ padding: '2rem', textAlign: 'center' }}>
          <h1>Unexpected error</h1>
          <p style={{ color: '#666' }}>The labor statistics dashboard could not be loaded.</p>
          <button type="button" onClick={() => reset()}>
            Retry
          </button>
        </main>
      </body>
    </html>
  );
}
