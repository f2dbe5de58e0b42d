import { Check } from 'lucide-react';
import type { Station } from '../types';
import { cn } from '../lib/utils';

interface StationListProps {
    stations: Station[];
    selectedStationId?: string;
    onSelect: (station: Station) => void;
    limit?: number;
}

export function StationList({ stations, selectedStationId, onSelect, limit = 500 }: StationListProps) {
    if (stations.length === 0) {
        return (
            <p className="text-sm text-amber-700 bg-amber-50 border border-amber-200 rounded-md px-3 py-2">
                No stations match your filters. Please adjust your search criteria.
            </p>
        );
    }

    const visible = stations.slice(0, limit);

    return (
        <div className="flex flex-col gap-1">
            <ul className="max-h-80 overflow-y-auto border border-border rounded-md divide-y divide-border">
                {visible.map(station => {
                    const selected = station.id === selectedStationId;
                    return (
                        <li key={station.id}>
                            <button
                                type="button"
                                onClick={() => onSelect(station)}
                                aria-pressed={selected}
                                className={cn(
                                    "w-full text-left px-3 py-2 text-sm flex items-center gap-2 hover:bg-muted transition-colors",
                                    selected && "bg-primary/10 font-medium"
                                )}
                            >
                                <span className="flex-1 truncate">{station.name} ({station.id})</span>
                                {selected && <Check className="h-4 w-4 text-primary" />}
                            </button>
                        </li>
                    );
                })}
            </ul>
            {stations.length > limit && (
                <p className="text-xs text-muted-foreground">
                    Showing the first {limit} of {stations.length} stations. Refine the filters to see more.
                </p>
            )}
        </div>
    );
}
