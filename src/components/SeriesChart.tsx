'use client';

import {
  CartesianGrid,
  Line,
  LineChart,
  ResponsiveContainer,
  Tooltip,
  XAxis,
  YAxis,
} from 'recharts';

export type ChartPoint = { date: string; value: number };

type Props = {
  title: string;
  points: ReadonlyArray<ChartPoint>;
  yLabel?: string;
  height?: number;
};

/** 単色の折れ線（マーカーなし） */
const LINE_COLOR = '#1f77b4';

export default function SeriesChart({ title, points, yLabel, height = 450 }: Props) {
  // Recharts は mutable な配列を要求する
  const data = [...points];

  return (
    <figure style={{ margin: 0 }}>
      <figcaption style={{ fontWeight: 600, fontSize: '1.1rem', marginBottom: '0.5rem' }}>
        {title}
      </figcaption>
      <div style={{ height }}>
        <ResponsiveContainer width="100%" height="100%">
          <LineChart data={data} margin={{ top: 16, right: 30, bottom: 24, left: 50 }}>
            <CartesianGrid strokeOpacity={0.15} />
            <XAxis dataKey="date" tickFormatter={(d: string) => d.slice(0, 7)} minTickGap={24} />
            <YAxis
              domain={['auto', 'auto']}
              label={yLabel ? { value: yLabel, angle: -90, position: 'insideLeft' } : undefined}
            />
            <Tooltip />
            <Line
              type="monotone"
              dataKey="value"
              stroke={LINE_COLOR}
              strokeWidth={3}
              dot={false}
              isAnimationActive={false}
            />
          </LineChart>
        </ResponsiveContainer>
      </div>
    </figure>
  );
}
