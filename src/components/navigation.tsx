import React from 'react';
import { ArrowLeft, ChevronsRight } from 'lucide-react';

export const NavButton = ({ onClick, children }: { onClick: () => void; children: React.ReactNode }) => (
  <button
    type="button"
    onClick={onClick}
    className="w-full flex justify-between items-center bg-indigo-600 text-white font-bold py-3 px-4 rounded-lg hover:bg-indigo-700 transition duration-300"
  >
    {children} <ChevronsRight />
  </button>
);

export const ReturnButton = ({ onClick }: { onClick: () => void }) => (
  <button
    type="button"
    onClick={onClick}
    className="flex items-center bg-gray-600 text-white font-bold py-2 px-4 rounded-lg hover:bg-gray-700 transition duration-300"
  >
    <ArrowLeft className="mr-2" /> Return to Calculators
  </button>
);
