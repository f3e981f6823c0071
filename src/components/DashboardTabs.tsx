'use client';

import { useState, type ReactNode } from 'react';

export type DashboardTab = {
  id: string;
  title: string;
  content: ReactNode;
};

export default function DashboardTabs({ tabs }: { tabs: ReadonlyArray<DashboardTab> }) {
  const [active, setActive] = useState(tabs[0]?.id ?? '');
  const current = tabs.find((t) => t.id === active) ?? tabs[0];

  return (
    <section>
      <div role="tablist" style={{ display: 'flex', gap: '0.5rem', borderBottom: '1px solid #e5e7eb' }}>
        {tabs.map((tab) => {
          const selected = tab.id === current?.id;
          return (
            <button
              key={tab.id}
              role="tab"
              aria-selected={selected}
              onClick={() => setActive(tab.id)}
              style={{
                padding: '0.75rem 1rem',
                border: 'none',
                borderBottom: selected ? '3px solid #0070f3' : '3px solid transparent',
                background: 'none',
                cursor: 'pointer',
                fontSize: '1rem',
                fontWeight: selected ? 600 : 400,
              }}
            >
              {tab.title}
            </button>
          );
        })}
      </div>
      <div role="tabpanel" style={{ paddingTop: '1.5rem' }}>
        {current?.content}
      </div>
    </section>
  );
}
