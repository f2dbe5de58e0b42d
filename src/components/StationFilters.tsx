import { useMemo } from 'react';
import { Search } from 'lucide-react';
import type { FilterCriteria, Station, StationStatus } from '../types';
import { listRivers, listStatuses } from '../lib/catalog';

interface StationFiltersProps {
    stations: Station[];
    criteria: FilterCriteria;
    onChange: (criteria: FilterCriteria) => void;
}

const STATUS_LABELS: Record<StationStatus, string> = {
    active: 'Active',
    suspended: 'Suspended',
    closed: 'Closed',
    unknown: 'Unknown'
};

export function StationFilters({ stations, criteria, onChange }: StationFiltersProps) {
    const rivers = useMemo(() => listRivers(stations), [stations]);
    const statuses = useMemo(() => listStatuses(stations), [stations]);
    const selectedStatuses = criteria.statuses ?? [];

    const toggleStatus = (status: StationStatus) => {
        const next = selectedStatuses.includes(status)
            ? selectedStatuses.filter(s => s !== status)
            : [...selectedStatuses, status];
        onChange({ ...criteria, statuses: next });
    };

    return (
        <div className="flex flex-col gap-3">
            <label className="relative block">
                <span className="sr-only">Search by station name</span>
                <Search className="absolute left-3 top-2.5 h-4 w-4 text-muted-foreground" />
                <input
                    type="text"
                    value={criteria.name ?? ''}
                    onChange={(e) => onChange({ ...criteria, name: e.target.value })}
                    placeholder="Search by station name"
                    className="w-full pl-9 pr-3 py-2 rounded-md border border-border bg-background/50 focus:ring-2 focus:ring-primary"
                />
            </label>

            <label className="flex flex-col gap-1 text-sm">
                <span className="text-muted-foreground">Filter by river</span>
                <select
                    value={criteria.river ?? ''}
                    onChange={(e) => onChange({ ...criteria, river: e.target.value })}
                    className="px-3 py-2 rounded-md border border-border bg-background"
                >
                    <option value="">All rivers</option>
                    {rivers.map(river => (
                        <option key={river} value={river}>{river}</option>
                    ))}
                </select>
            </label>

            {statuses.length > 0 && (
                <fieldset className="text-sm">
                    <legend className="text-muted-foreground mb-1">Filter by status</legend>
                    <div className="flex flex-wrap gap-3">
                        {statuses.map(status => (
                            <label key={status} className="flex items-center gap-1.5">
                                <input
                                    type="checkbox"
                                    checked={selectedStatuses.includes(status)}
                                    onChange={() => toggleStatus(status)}
                                />
                                {STATUS_LABELS[status]}
                            </label>
                        ))}
                    </div>
                </fieldset>
            )}
        </div>
    );
}
