'use client';

import { captureException } from '@sentry/nextjs';
import { useEffect } from 'react';

export default function Error({
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
    <main style={{ padding: '2rem', textAlign: 'center' }}>
      <h2>Something went wrong</h2>
      <p style={{ color: '#666', marginTop: '1rem' }}>
        The dashboard failed to render. Check the configuration and the update job logs.
      </p>
      {error.digest && (
        <p style={{ color: '#999', fontFamily: 'monospace', fontSize: '0.85rem' }}>
          digest: {error.digest}
        </p>
      )}
      <button
        onClick={() => reset()}
        style={{
          marginTop: '1.5rem',
          padding: '0.75rem 1.5rem',
          backgroundColor: '#1f77b4',
          color: 'white',
          border: 'none',
          borderRadius: '4px',
          cursor: 'pointer',
          fontSize: '1rem',
        }}
      >
        Retry
      </button>
    </main>
  );
}
