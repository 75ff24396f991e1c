import React from 'react';
import { BarChart, Droplets, Leaf, Mountain, Recycle, Scale } from 'lucide-react';
import type { MixResultKey, ResultRow as ResultRowData } from '@/types';

interface ResultsCardProps {
  title: string;
  description?: string;
  rows: ResultRowData[] | null;
  tone?: 'base' | 'optimized';
  emptyMessage?: string;
  children?: React.ReactNode;
}

const ICONS: Partial<Record<MixResultKey, React.ReactNode>> = {
  water: <Droplets className="w-4 h-4" />,
  scm: <Leaf className="w-4 h-4" />,
  fineRecycled: <Recycle className="w-4 h-4" />,
  coarseRecycled: <Recycle className="w-4 h-4" />,
  coarseAggregate: <Mountain className="w-4 h-4" />,
};

const ResultRow = ({ icon, label, value, unit }: { icon: React.ReactNode; label: string; value: string; unit: string }) => (
  <div className="flex justify-between items-center text-sm py-2 border-b border-gray-200 last:border-b-0">
    <div className="flex items-center gap-2 text-gray-500">
      {icon}
      <span>{label}</span>
    </div>
    <span className="font-mono font-medium text-gray-900">{value} <span className="text-xs text-gray-500">{unit}</span></span>
  </div>
);

export function ResultsCard({ title, description, rows, tone = 'base', emptyMessage = 'Enter valid inputs to see the mix.', children }: ResultsCardProps) {
  const border = tone === 'optimized' ? 'border-green-200 bg-green-50' : 'border-blue-200 bg-blue-50';

  if (!rows) {
    return (
      <section aria-label={title} className="p-6 rounded-lg border border-dashed text-center flex flex-col items-center gap-2">
        <h3 className="text-lg font-semibold text-gray-700">{title}</h3>
        <p className="text-sm text-gray-500">{emptyMessage}</p>
        <BarChart className="w-16 h-16 text-gray-300" />
        {children}
      </section>
    );
  }

  return (
    <section aria-label={title} className={`p-6 rounded-lg shadow-md border ${border}`}>
      <h3 className="text-xl font-bold text-gray-800 border-b pb-2">{title}</h3>
      {description && <p className="text-sm text-gray-600 mt-2">{description}</p>}
      <div className="mt-2">
        {rows.map((row) => (
          <ResultRow key={row.key} icon={ICONS[row.key] ?? <Scale className="w-4 h-4" />} label={row.label} value={row.value} unit={row.unit} />
        ))}
      </div>
      {children}
    </section>
  );
}
