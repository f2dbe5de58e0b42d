import { useState } from 'react';
import { describe, expect, it, vi } from 'vitest';
import { render, screen } from '@testing-library/react';
import userEvent from '@testing-library/user-event';
import { StationFilters } from './StationFilters';
import type { FilterCriteria, Station } from '../types';

const stations: Station[] = [
    { id: 'S1', name: 'River Ouse at York', river: 'Ouse', status: 'active', measureCount: 1 },
    { id: 'S2', name: 'Unnamed', status: 'unknown', measureCount: 0 },
    { id: 'S3', name: 'Bewdley', river: 'Severn', status: 'closed', measureCount: 2 }
];

function Harness({ onChange }: { onChange: (criteria: FilterCriteria) => void }) {
    const [criteria, setCriteria] = useState<FilterCriteria>({});
    return (
        <StationFilters
            stations={stations}
            criteria={criteria}
            onChange={(next) => {
                setCriteria(next);
                onChange(next);
            }}
        />
    );
}

describe('StationFilters', () => {
    it('offers the rivers and statuses present in the catalog', () => {
        render(<StationFilters stations={stations} criteria={{}} onChange={vi.fn()} />);

        expect(screen.getAllByRole('option').map(option => option.textContent)).toEqual(['All rivers', 'Ouse', 'Severn']);
        expect(screen.getAllByRole('checkbox').map(box => box.parentElement?.textContent)).toEqual(['Active', 'Closed', 'Unknown']);
    });

    it('combines name, river and status into one set of criteria', async () => {
        const user = userEvent.setup();
        const onChange = vi.fn();
        render(<Harness onChange={onChange} />);

        await user.type(screen.getByPlaceholderText('Search by station name'), 'york');
        await user.selectOptions(screen.getByRole('combobox'), 'Ouse');
        await user.click(screen.getByRole('checkbox', { name: 'Active' }));

        expect(onChange).toHaveBeenLastCalledWith({ name: 'york', river: 'Ouse', statuses: ['active'] });
    });

    it('unticks a selected status', async () => {
        const user = userEvent.setup();
        const onChange = vi.fn();
        render(<StationFilters stations={stations} criteria={{ statuses: ['closed'] }} onChange={onChange} />);

        await user.click(screen.getByRole('checkbox', { name: 'Closed' }));

        expect(onChange).toHaveBeenCalledWith({ statuses: [] });
    });
});
