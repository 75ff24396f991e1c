"use client";

import React, { useMemo, useState } from 'react';
import { zodResolver } from '@hookform/resolvers/zod';
import { useForm, useWatch } from 'react-hook-form';
import { AlertTriangle, Globe2 } from 'lucide-react';
import {
  BASE_MIX_ROWS,
  computeEmpiricalMix,
  createSeededRandom,
  defaultRandom,
  EMPIRICAL_DEFAULTS,
  empiricalInputSchema,
  empiricalMixSchema,
  OPTIMIZED_MIX_ROWS,
  optimizeMix,
  seedSchema,
  SLUMP_OPTIONS,
  STRENGTH_OPTIONS,
  toResultRows,
  type EmpiricalFormValues,
} from '@/lib/mix-design';
import type { EmpiricalMixInputs, OptimizedMixResult } from '@/types';
import { MixComparisonChart } from './mix-comparison-chart';
import { ResultsCard } from './results-card';

// A run belongs to the inputs it was made for
type OptimizationRun =
  | { inputs: EmpiricalMixInputs; result: OptimizedMixResult; error: null }
  | { inputs: EmpiricalMixInputs; result: null; error: string };

const sameInputs = (a: EmpiricalMixInputs, b: EmpiricalMixInputs) =>
  a.strengthMPa === b.strengthMPa && a.slumpMm === b.slumpMm;

const selectClass =
  'mt-1 block w-full px-3 py-2 border border-gray-300 rounded-md focus:outline-none focus:ring-2 focus:ring-blue-500';

export function EmpiricalCalculator() {
  const form = useForm<EmpiricalFormValues>({
    resolver: zodResolver(empiricalInputSchema),
    defaultValues: EMPIRICAL_DEFAULTS,
    mode: 'onChange',
  });
  const { register, control, formState: { errors } } = form;
  const values = useWatch({ control });

  const [run, setRun] = useState<OptimizationRun | null>(null);

  const inputs = useMemo((): EmpiricalMixInputs | null => {
    const parsed = empiricalMixSchema.safeParse(values);
    return parsed.success ? parsed.data : null;
  }, [values.strengthMPa, values.slumpMm]);

  const baseMix = useMemo(
    () => (inputs ? computeEmpiricalMix(inputs.strengthMPa, inputs.slumpMm) : null),
    [inputs]
  );

  const current = run && inputs && sameInputs(run.inputs, inputs) ? run : null;
  const optimized = current?.result ?? null;
  const error = current?.error ?? null;

  const handleOptimize = () => {
    const seed = seedSchema.safeParse(values.seed);
    if (!seed.success) {
      void form.trigger('seed');
      return;
    }
    if (!inputs || !baseMix) return;
    try {
      const random = seed.data === undefined ? defaultRandom : createSeededRandom(seed.data);
      const result = optimizeMix(baseMix, inputs.strengthMPa, inputs.slumpMm, random);
      setRun({ inputs, result, error: null });
    } catch (err) {
      console.error('Calculation error:', err);
      setRun({ inputs, result: null, error: err instanceof Error ? err.message : String(err) });
    }
  };

  return (
    <div className="p-4 md:p-6">
      <h2 className="text-3xl font-bold mb-6 text-gray-800 text-center">Concrete Mix Designer</h2>
      <div className="grid grid-cols-1 lg:grid-cols-3 gap-8 items-start">
        <form className="lg:col-span-1 bg-yellow-50 p-6 rounded-lg shadow-md border border-yellow-200" onSubmit={(e) => e.preventDefault()}>
          <h3 className="text-xl font-bold mb-4 text-gray-800 border-b pb-2">Inputs</h3>
          <div className="space-y-4">
            <label className="block">
              <span className="text-gray-700 font-medium">Compressive Strength (MPa)</span>
              <select className={selectClass} {...register('strengthMPa')}>
                {STRENGTH_OPTIONS.map((value) => (
                  <option key={value} value={value}>{value}</option>
                ))}
              </select>
              {errors.strengthMPa && <span className="text-sm text-red-600">{errors.strengthMPa.message}</span>}
            </label>
            <label className="block">
              <span className="text-gray-700 font-medium">Slump (mm)</span>
              <select className={selectClass} {...register('slumpMm')}>
                {SLUMP_OPTIONS.map((value) => (
                  <option key={value} value={value}>{value}</option>
                ))}
              </select>
              {errors.slumpMm && <span className="text-sm text-red-600">{errors.slumpMm.message}</span>}
            </label>
            <label className="block">
              <span className="text-gray-700 font-medium">Random seed (optional)</span>
              <input
                type="number"
                min={0}
                step={1}
                placeholder="Leave blank for a fresh draw"
                className={selectClass}
                {...register('seed')}
              />
              {errors.seed && <span className="text-sm text-red-600">{errors.seed.message}</span>}
            </label>
          </div>
          <button
            type="button"
            onClick={handleOptimize}
            disabled={!baseMix}
            className="mt-6 w-full bg-green-600 text-white font-bold py-3 px-4 rounded-lg hover:bg-green-700 transition duration-300 disabled:bg-gray-400 flex items-center justify-center"
          >
            <Globe2 className="-ml-1 mr-3 h-5 w-5" />
            Optimization Option
          </button>
          {error && (
            <div role="alert" className="mt-4 flex items-center gap-2 text-red-700 text-sm">
              <AlertTriangle className="w-4 h-4" /> {error}
            </div>
          )}
        </form>

        <div className="lg:col-span-2 space-y-6">
          <ResultsCard
            title="Designed Mix for 1 m³ of Concrete"
            rows={baseMix ? toResultRows(baseMix, BASE_MIX_ROWS) : null}
          />
          {optimized && baseMix && (
            <>
              <ResultsCard
                title="Optimized Sustainable Mix"
                description="30% of the cement replaced by SCM, 20% of coarse and 15% of fine aggregate replaced by recycled aggregate."
                rows={toResultRows(optimized, OPTIMIZED_MIX_ROWS)}
                tone="optimized"
              />
              <MixComparisonChart base={baseMix} optimized={optimized} />
            </>
          )}
        </div>
      </div>
    </div>
  );
}
