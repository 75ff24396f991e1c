import type { RowLabel } from '@/lib/mix-design';
import type { Language } from '@/types';

export interface VolumetricLabels {
  title: string;
  intro: string;
  strength: string;
  waterCementRatio: string;
  fineAggregateFraction: string;
  results: string;
  cement: string;
  water: string;
  fineAggregate: string;
  coarseAggregate: string;
  kg: string;
  volumeCheck: string;
  emptyState: string;
  language: string;
}

export const VOLUMETRIC_LABELS: Record<Language, VolumetricLabels> = {
  en: {
    title: 'Concrete Mix Design',
    intro: 'Enter the values below to compute material quantities for 1 m³ of concrete.',
    strength: 'Required compressive strength (MPa)',
    waterCementRatio: 'Water-cement ratio',
    fineAggregateFraction: 'Fine aggregate ratio',
    results: 'Mix results',
    cement: 'Cement',
    water: 'Water',
    fineAggregate: 'Sand (fine aggregate)',
    coarseAggregate: 'Gravel (coarse aggregate)',
    kg: 'kg',
    volumeCheck: 'Total absolute volume',
    emptyState: 'Enter valid inputs to see the mix.',
    language: 'العربية',
  },
  ar: {
    title: 'تصميم الخلطة الخرسانية',
    intro: 'أدخل القيم التالية لحساب كميات المواد لكل 1 متر مكعب من الخرسانة.',
    strength: 'مقاومة الضغط المطلوبة (MPa)',
    waterCementRatio: 'نسبة الماء إلى الأسمنت',
    fineAggregateFraction: 'نسبة الركام الناعم',
    results: 'نتائج الخلطة',
    cement: 'الأسمنت',
    water: 'الماء',
    fineAggregate: 'الرمل (الركام الناعم)',
    coarseAggregate: 'الزلط (الركام الخشن)',
    kg: 'كجم',
    volumeCheck: 'الحجم المطلق الكلي',
    emptyState: 'أدخل قيمًا صحيحة لعرض الخلطة.',
    language: 'English',
  },
};

export const textDirection = (language: Language) => (language === 'ar' ? 'rtl' : 'ltr');

export const volumetricRowLabels = (labels: VolumetricLabels): RowLabel[] => [
  { key: 'cement', label: labels.cement, unit: labels.kg },
  { key: 'water', label: labels.water, unit: labels.kg },
  { key: 'fineAggregate', label: labels.fineAggregate, unit: labels.kg },
  { key: 'coarseAggregate', label: labels.coarseAggregate, unit: labels.kg },
];
