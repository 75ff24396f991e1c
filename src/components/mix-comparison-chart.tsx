import React from 'react';
import { Bar, BarChart, CartesianGrid, Legend, ResponsiveContainer, Tooltip, XAxis, YAxis } from 'recharts';
import { round1 } from '@/lib/mix-design';
import type { MixResult, OptimizedMixResult } from '@/types';

interface ComparisonDatum {
  material: string;
  base: number;
  optimized: number;
}

export const buildComparisonData = (base: MixResult, optimized: OptimizedMixResult): ComparisonDatum[] => [
  { material: 'Cement', base: round1(base.cement), optimized: round1(optimized.cement) },
  { material: 'SCMs', base: 0, optimized: round1(optimized.scm) },
  { material: 'Water', base: round1(base.water), optimized: round1(optimized.water) },
  { material: 'Fine Agg.', base: round1(base.fineAggregate), optimized: round1(optimized.fineAggregate) },
  { material: 'Fine Recycled', base: 0, optimized: round1(optimized.fineRecycled) },
  { material: 'Coarse Agg.', base: round1(base.coarseAggregate), optimized: round1(optimized.coarseAggregate) },
  { material: 'Coarse Recycled', base: 0, optimized: round1(optimized.coarseRecycled) },
];

export function MixComparisonChart({ base, optimized }: { base: MixResult; optimized: OptimizedMixResult }) {
  const data = buildComparisonData(base, optimized);

  return (
    <div className="w-full h-72 mt-4">
      <h3 className="text-lg font-semibold text-center text-gray-700">Base vs Optimized (kg/m³)</h3>
      <ResponsiveContainer>
        <BarChart data={data} margin={{ top: 5, right: 20, left: -10, bottom: 5 }}>
          <CartesianGrid strokeDasharray="3 3" />
          <XAxis dataKey="material" interval={0} tick={{ fontSize: 11 }} />
          <YAxis label={{ value: 'Mass (kg)', angle: -90, position: 'insideLeft' }} />
          <Tooltip formatter={(value) => `${value} kg`} />
          <Legend />
          <Bar dataKey="base" name="Base mix" fill="#4f46e5" />
          <Bar dataKey="optimized" name="Optimized mix" fill="#16a34a" />
        </BarChart>
      </ResponsiveContainer>
    </div>
  );
}
