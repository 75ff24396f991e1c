import React from 'react';
import { fireEvent, render, screen, within } from '@testing-library/react';
import userEvent from '@testing-library/user-event';
import { describe, expect, it } from 'vitest';
import { VolumetricCalculator } from './volumetric-calculator';

describe('VolumetricCalculator', () => {
  it('shows the mix for the default inputs', () => {
    render(<VolumetricCalculator />);
    const results = screen.getByRole('region', { name: 'Mix results' });
    expect(within(results).getByText('400.0')).toBeInTheDocument();
    expect(within(results).getByText('200.0')).toBeInTheDocument();
    expect(within(results).getByText('713.4')).toBeInTheDocument();
    expect(within(results).getByText('1090.3')).toBeInTheDocument();
    expect(within(results).getByText('Total absolute volume: 1.000 m³')).toBeInTheDocument();
  });

  it('recomputes water when the w/c ratio changes', async () => {
    render(<VolumetricCalculator />);
    fireEvent.change(screen.getByLabelText('Water-cement ratio'), { target: { value: '0.6' } });
    const results = screen.getByRole('region', { name: 'Mix results' });
    expect(await within(results).findByText('240.0')).toBeInTheDocument();
  });

  it('hides results and shows the message for an out-of-range ratio', async () => {
    render(<VolumetricCalculator />);
    fireEvent.change(screen.getByLabelText('Water-cement ratio'), { target: { value: '0.8' } });
    expect(await screen.findByText('Must be at most 0.7')).toBeInTheDocument();
    expect(screen.queryByText('200.0')).not.toBeInTheDocument();
    const results = screen.getByRole('region', { name: 'Mix results' });
    expect(within(results).getByText('Enter valid inputs to see the mix.')).toBeInTheDocument();
  });

  it('switches to Arabic', async () => {
    const user = userEvent.setup();
    const { container } = render(<VolumetricCalculator />);
    await user.click(screen.getByRole('button', { name: /العربية/ }));
    expect(screen.getByRole('heading', { name: 'تصميم الخلطة الخرسانية' })).toBeInTheDocument();
    expect(container.firstElementChild).toHaveAttribute('dir', 'rtl');
    const results = screen.getByRole('region', { name: 'نتائج الخلطة' });
    expect(within(results).getByText('الأسمنت')).toBeInTheDocument();
    expect(within(results).getAllByText('كجم')).toHaveLength(4);
  });
});
