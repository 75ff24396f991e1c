"use client";

import React, { useMemo, useState } from 'react';
import { zodResolver } from '@hookform/resolvers/zod';
import { useForm, useWatch } from 'react-hook-form';
import { AlertTriangle, Languages } from 'lucide-react';
import {
  clamp,
  computeVolumetricMix,
  FINE_AGGREGATE_FRACTION_RANGE,
  VOLUMETRIC_DEFAULTS,
  volumetricInputSchema,
  toResultRows,
  WATER_CEMENT_RATIO_RANGE,
  type VolumetricFormValues,
} from '@/lib/mix-design';
import { textDirection, VOLUMETRIC_LABELS, volumetricRowLabels } from '@/lib/labels';
import type { Language, VolumetricMixResult } from '@/types';
import { ResultsCard } from './results-card';

type Outcome = { result: VolumetricMixResult; error: null } | { result: null; error: string | null };

const inputClass =
  'mt-1 block w-full px-3 py-2 border border-gray-300 rounded-md focus:outline-none focus:ring-2 focus:ring-blue-500';

export function VolumetricCalculator() {
  const [language, setLanguage] = useState<Language>('en');
  const labels = VOLUMETRIC_LABELS[language];

  const form = useForm<VolumetricFormValues>({
    resolver: zodResolver(volumetricInputSchema),
    defaultValues: VOLUMETRIC_DEFAULTS,
    mode: 'onChange',
  });
  const { register, control, formState: { errors } } = form;
  const values = useWatch({ control });

  const outcome = useMemo((): Outcome => {
    const parsed = volumetricInputSchema.safeParse(values);
    if (!parsed.success) return { result: null, error: null };
    try {
      return { result: computeVolumetricMix(parsed.data), error: null };
    } catch (error) {
      console.error('Calculation error:', error);
      return { result: null, error: error instanceof Error ? error.message : String(error) };
    }
  }, [values.strengthMPa, values.waterCementRatio, values.fineAggregateFraction]);

  const { result } = outcome;
  const totalVolume = result
    ? result.volumes.cement + result.volumes.water + result.volumes.fineAggregate + result.volumes.coarseAggregate
    : null;

  const rows = result ? toResultRows(result, volumetricRowLabels(labels)) : null;

  return (
    <div className="p-4 md:p-6" dir={textDirection(language)} lang={language}>
      <div className="flex items-center justify-between mb-6">
        <h2 className="text-3xl font-bold text-gray-800">{labels.title}</h2>
        <button
          type="button"
          onClick={() => setLanguage(language === 'en' ? 'ar' : 'en')}
          className="flex items-center gap-2 text-sm border border-gray-300 rounded-md px-3 py-1 hover:bg-gray-100"
        >
          <Languages className="w-4 h-4" /> {labels.language}
        </button>
      </div>
      <p className="text-gray-600 mb-6">{labels.intro}</p>

      <div className="grid grid-cols-1 lg:grid-cols-2 gap-8 items-start">
        <form className="bg-yellow-50 p-6 rounded-lg shadow-md border border-yellow-200 space-y-4" onSubmit={(e) => e.preventDefault()}>
          <label className="block">
            <span className="text-gray-700 font-medium">{labels.strength}</span>
            <input type="number" step="1" className={inputClass} {...register('strengthMPa')} />
            {errors.strengthMPa && <span className="text-sm text-red-600">{errors.strengthMPa.message}</span>}
          </label>
          <label className="block">
            <span className="text-gray-700 font-medium">{labels.waterCementRatio}</span>
            <input
              type="number"
              step="0.01"
              min={WATER_CEMENT_RATIO_RANGE.min}
              max={WATER_CEMENT_RATIO_RANGE.max}
              className={inputClass}
              {...register('waterCementRatio')}
            />
            {errors.waterCementRatio && <span className="text-sm text-red-600">{errors.waterCementRatio.message}</span>}
          </label>
          <label className="block">
            <span className="text-gray-700 font-medium">
              {labels.fineAggregateFraction}: {clamp(Number(values.fineAggregateFraction), FINE_AGGREGATE_FRACTION_RANGE.min, FINE_AGGREGATE_FRACTION_RANGE.max).toFixed(2)}
            </span>
            <input
              type="range"
              step="0.01"
              min={FINE_AGGREGATE_FRACTION_RANGE.min}
              max={FINE_AGGREGATE_FRACTION_RANGE.max}
              className="mt-2 block w-full"
              {...register('fineAggregateFraction')}
            />
          </label>
        </form>

        <ResultsCard title={labels.results} rows={rows} emptyMessage={labels.emptyState}>
          {outcome.error && (
            <div role="alert" className="mt-2 flex items-center gap-2 text-red-700 text-sm">
              <AlertTriangle className="w-4 h-4" /> {outcome.error}
            </div>
          )}
          {totalVolume !== null && (
            <p className="mt-4 text-xs text-gray-500">
              {labels.volumeCheck}: {totalVolume.toFixed(3)} m³
            </p>
          )}
        </ResultsCard>
      </div>
    </div>
  );
}
