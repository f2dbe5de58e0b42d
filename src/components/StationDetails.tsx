import { MapPin } from 'lucide-react';
import type { Station, StationStatus } from '../types';
import { cn } from '../lib/utils';

const STATUS_STYLES: Record<StationStatus, string> = {
    active: 'bg-green-100 text-green-800',
    suspended: 'bg-amber-100 text-amber-800',
    closed: 'bg-red-100 text-red-800',
    unknown: 'bg-muted text-muted-foreground'
};

export const mapLink = (latitude: number, longitude: number) =>
    `https://www.openstreetmap.org/?mlat=${latitude}&mlon=${longitude}#map=13/${latitude}/${longitude}`;

export function StationDetails({ station }: { station: Station }) {
    return (
        <dl className="grid grid-cols-[auto,1fr] gap-x-3 gap-y-1 text-sm">
            <dt className="text-muted-foreground">ID</dt>
            <dd className="font-mono">{station.id}</dd>

            <dt className="text-muted-foreground">River</dt>
            <dd>{station.river ?? 'Unknown'}</dd>

            {station.town && (
                <>
                    <dt className="text-muted-foreground">Town</dt>
                    <dd>{station.town}</dd>
                </>
            )}
            {station.catchment && (
                <>
                    <dt className="text-muted-foreground">Catchment</dt>
                    <dd>{station.catchment}</dd>
                </>
            )}

            <dt className="text-muted-foreground">Status</dt>
            <dd>
                <span className={cn('px-2 py-0.5 rounded text-xs font-medium capitalize', STATUS_STYLES[station.status])}>
                    {station.status}
                </span>
            </dd>

            {station.coordinates && (
                <>
                    <dt className="text-muted-foreground">Location</dt>
                    <dd>
                        {station.coordinates.latitude.toFixed(4)}, {station.coordinates.longitude.toFixed(4)}{' '}
                        <a
                            href={mapLink(station.coordinates.latitude, station.coordinates.longitude)}
                            target="_blank"
                            rel="noreferrer"
                            className="inline-flex items-center gap-1 text-primary hover:underline"
                        >
                            <MapPin className="h-3 w-3" /> View on map
                        </a>
                    </dd>
                </>
            )}

            <dt className="text-muted-foreground">Measures</dt>
            <dd>{station.measureCount}</dd>
        </dl>
    );
}
