"use client";

import React, { useState } from 'react';
import { EmpiricalCalculator } from '@/components/empirical-calculator';
import { NavButton, ReturnButton } from '@/components/navigation';
import { VolumetricCalculator } from '@/components/volumetric-calculator';
import type { Page } from '@/types';

const CalculatorMenu = ({ setPage }: { setPage: (page: Page) => void }) => (
  <div className="p-4 md:p-6 max-w-xl mx-auto space-y-4">
    <h2 className="text-2xl font-bold text-gray-800">Choose a calculator</h2>
    <p className="text-gray-600">Both compute material quantities for 1 m³ of concrete.</p>
    <NavButton onClick={() => setPage('volumetric')}>Absolute Volume Method (w/c ratio)</NavButton>
    <NavButton onClick={() => setPage('empirical')}>Strength &amp; Slump with Sustainable Option</NavButton>
  </div>
);

// Main App Component
export default function App() {
  const [page, setPage] = useState<Page>('home');

  const renderPage = () => {
    switch (page) {
      case 'volumetric':
        return <VolumetricCalculator />;
      case 'empirical':
        return <EmpiricalCalculator />;
      case 'home':
      default:
        return <CalculatorMenu setPage={setPage} />;
    }
  };

  return (
    <div className="min-h-screen bg-gray-100 font-sans text-gray-900">
      <header className="bg-white shadow-md"><div className="max-w-7xl mx-auto px-4 sm:px-6 lg:px-8 py-4"><h1 className="text-3xl font-bold text-gray-800">Concrete Mix Designer</h1><p className="text-gray-600">Material quantities per cubic meter from rule-of-thumb mix formulas.</p></div></header>
      <main className="max-w-7xl mx-auto px-4 sm:px-6 lg:px-8 py-8">
        {page !== 'home' && <div className="mb-6"><ReturnButton onClick={() => setPage('home')} /></div>}
        <div className="bg-white rounded-lg shadow-xl overflow-hidden">{renderPage()}</div>
      </main>
      <footer className="text-center py-4 text-sm text-gray-500"><p>Disclaimer: Quantities come from simplified empirical formulas and are not a substitute for a trial-batched mix design to the applicable standard.</p></footer>
    </div>
  );
}
