import { cloneElement, type ReactElement } from 'react';
import { describe, expect, it, vi } from 'vitest';
import { render, screen } from '@testing-library/react';
import { ReadingsChart } from './ReadingsChart';
import { groupByMeasure } from '../lib/stats';
import type { Reading } from '../types';

// ResponsiveContainer measures its parent, which jsdom reports as 0x0.
vi.mock('recharts', async () => {
    const actual = await vi.importActual<typeof import('recharts')>('recharts');
    return {
        ...actual,
        ResponsiveContainer: ({ children }: { children: ReactElement }) => (
            <div style={{ width: 800, height: 320 }}>
                {cloneElement(children, { width: 800, height: 320 })}
            </div>
        )
    };
});

const reading = (timestamp: string, value: number, unit = 'm'): Reading => ({
    stationId: 'S1',
    timestamp,
    measure: 'level',
    value,
    unit
});

describe('ReadingsChart', () => {
    it('renders an empty state for a series without readings', () => {
        render(<ReadingsChart series={{ key: 'level', label: 'Level', measure: 'level', readings: [] }} />);

        expect(screen.getByText('No level readings in this window')).toBeInTheDocument();
    });

    it('draws the series and its summary cards', () => {
        const [series] = groupByMeasure([
            reading('2024-01-01T00:00:00.000Z', 1),
            reading('2024-01-01T00:15:00.000Z', 2),
            reading('2024-01-01T00:30:00.000Z', 4.5)
        ]);

        const { container } = render(<ReadingsChart series={series} />);

        expect(screen.getByRole('heading', { name: 'Level (m)' })).toBeInTheDocument();
        expect(screen.getByText('Latest Value').nextElementSibling?.textContent).toBe('4.50 m');
        expect(screen.getByText('Average').nextElementSibling?.textContent).toBe('2.50 m');
        expect(screen.getByText('Min').nextElementSibling?.textContent).toBe('1.00 m');
        expect(screen.getByText('Max').nextElementSibling?.textContent).toBe('4.50 m');
        expect(container.querySelector('.recharts-line')).not.toBeNull();
        expect(screen.queryByText(/Mixed units/)).toBeNull();
    });

    it('warns when the series mixes units', () => {
        const [series] = groupByMeasure([
            reading('2024-01-01T00:00:00.000Z', 1.1),
            reading('2024-01-01T00:15:00.000Z', 120, 'cm')
        ]);

        render(<ReadingsChart series={series} />);

        expect(screen.getByText('Mixed units in this series: m, cm. Values are shown as reported.')).toBeInTheDocument();
    });
});
