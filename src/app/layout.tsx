import type { Metadata } from 'next';
import type { ReactNode } from 'react';

export const metadata: Metadata = {
  title: 'U.S. Labor Statistics Dashboard',
  description: 'Monthly BLS employment, unemployment, participation, wages and hours',
};

export default function RootLayout({ children }: Readonly<{ children: ReactNode }>) {
  return (
    <html lang="en">
      <body
        style={{
          margin: 0,
          fontFamily: "-apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif",
          color: '#1f2937',
          backgroundColor: '#ffffff',
        }}
      >
        {children}
      </body>
    </html>
  );
}
