import { useEffect, useMemo, useState } from 'react';
import { useNavigate, useParams } from 'react-router-dom';
import { AlertTriangle, Loader2, RefreshCw } from 'lucide-react';
import { subHours } from 'date-fns';

import { StationFilters } from '../components/StationFilters';
import { StationList } from '../components/StationList';
import { StationDetails } from '../components/StationDetails';
import { StationMap } from '../components/StationMap';
import { ReadingsChart } from '../components/ReadingsChart';
import { ReadingsTable } from '../components/ReadingsTable';
import { StatusCenter, type StatusTask } from '../components/StatusCenter';
import { useMonitoringSession } from '../hooks/useMonitoringSession';
import { usePreferences } from '../hooks/usePreferences';
import { groupByMeasure } from '../lib/stats';
import { totalDropped } from '../lib/readings';
import { downloadReadingsCsv } from '../lib/export';
import { formatTimestamp } from '../lib/dateUtils';
import { logger } from '../lib/logger';
import type { MonitoringSession } from '../session/monitoringSession';
import type { FilterCriteria, Station } from '../types';

interface DashboardProps {
    session: MonitoringSession;
}

const reportFailure = (context: string) => (error: unknown) => {
    logger.error(context, error);
};

export function Dashboard({ session }: DashboardProps) {
    const { preferences } = usePreferences();
    const state = useMonitoringSession(session);
    const { stationId: routeStationId } = useParams();
    const navigate = useNavigate();

    const [selectedSeriesKey, setSelectedSeriesKey] = useState<string | null>(null);
    const [tasks, setTasks] = useState<StatusTask[]>([]);

    const selectedStation = session.selectedStation;
    const series = useMemo(() => groupByMeasure(state.readings), [state.readings]);
    const activeSeries = series.find(s => s.key === selectedSeriesKey) ?? series[0];

    const pushTask = (task: StatusTask) => {
        setTasks(prev => [...prev.filter(t => t.id !== task.id), task]);
        if (task.status === 'success') {
            setTimeout(() => setTasks(prev => prev.filter(t => t.id !== task.id)), 3000);
        }
    };

    const refresh = () => {
        session.dispatch({ type: 'refresh' }).catch(reportFailure('Station refresh failed'));
    };

    // Load the catalog once per session.
    useEffect(() => {
        if (state.catalogStatus === 'idle') {
            session.dispatch({ type: 'load' }).catch(reportFailure('Station load failed'));
        }
        // eslint-disable-next-line react-hooks/exhaustive-deps
    }, [session]);

    useEffect(() => {
        if (state.catalogStatus === 'loading') {
            pushTask({ id: 'catalog', message: 'Loading measurement stations...', status: 'pending' });
        } else if (state.catalogStatus === 'ready') {
            pushTask({ id: 'catalog', message: `Loaded ${state.catalog.length} measurement stations`, status: 'success' });
        } else if (state.catalogStatus === 'error') {
            pushTask({ id: 'catalog', message: state.error ?? 'Failed to load stations', status: 'error' });
        }
        // eslint-disable-next-line react-hooks/exhaustive-deps
    }, [state.catalogStatus]);

    // The route is the source of truth for the selected station.
    useEffect(() => {
        if (state.catalogStatus !== 'ready') return;
        if (!routeStationId) {
            if (state.selectedStationId) session.dispatch({ type: 'clear' }).catch(reportFailure('Clear failed'));
            return;
        }
        const end = new Date();
        session
            .dispatch({ type: 'select', stationId: routeStationId, window: { start: subHours(end, preferences.windowHours), end } })
            .catch(reportFailure(`Loading readings for ${routeStationId} failed`));
        setSelectedSeriesKey(null);
        // eslint-disable-next-line react-hooks/exhaustive-deps
    }, [routeStationId, state.catalogStatus, state.catalog, preferences.windowHours, session]);

    const handleSelect = (station: Station) => {
        navigate(`/stations/${encodeURIComponent(station.id)}`);
    };

    const handleFilter = (criteria: FilterCriteria) => {
        session.dispatch({ type: 'filter', criteria }).catch(reportFailure('Filter failed'));
    };

    const handleDownload = () => {
        if (!selectedStation || !activeSeries) return;
        downloadReadingsCsv(selectedStation, activeSeries.readings, activeSeries.key.replace(':', '_'));
    };

    const dropped = totalDropped(state.diagnostics.dropped);

    return (
        <div className="container mx-auto p-4 grid grid-cols-1 lg:grid-cols-[340px,1fr] gap-6">
            <aside className="space-y-4">
                <div className="flex items-center justify-between">
                    <h2 className="text-lg font-semibold">Station Selection</h2>
                    <button
                        onClick={refresh}
                        disabled={state.catalogStatus === 'loading'}
                        title="Refresh stations"
                        className="p-2 hover:bg-muted rounded-full transition-colors disabled:opacity-50"
                    >
                        <RefreshCw className={state.catalogStatus === 'loading' ? 'h-4 w-4 animate-spin' : 'h-4 w-4'} />
                    </button>
                </div>

                {state.catalogStatus === 'error' && (
                    <div className="flex items-center gap-2 text-sm text-red-700 bg-red-50 border border-red-200 rounded-md px-3 py-2">
                        <AlertTriangle className="h-4 w-4" /> {state.error}
                    </div>
                )}

                {state.catalogStatus === 'ready' && (
                    <>
                        <StationFilters stations={state.catalog} criteria={state.criteria} onChange={handleFilter} />
                        <p className="text-sm text-muted-foreground">
                            Showing {state.filtered.length} stations
                            {state.diagnostics.skippedStations > 0 && ` (${state.diagnostics.skippedStations} records skipped)`}
                        </p>
                        <StationList stations={state.filtered} selectedStationId={state.selectedStationId} onSelect={handleSelect} />
                    </>
                )}

                {selectedStation && (
                    <div className="border-t border-border pt-4 space-y-2">
                        <h3 className="font-semibold">Station Details</h3>
                        <StationDetails station={selectedStation} />
                    </div>
                )}
            </aside>

            <section className="space-y-4 min-w-0">
                <div className="h-[320px]">
                    <StationMap stations={state.filtered} selectedStation={selectedStation} onSelect={handleSelect} />
                </div>

                {!selectedStation && state.catalogStatus === 'ready' && (
                    <p className="text-muted-foreground">
                        {routeStationId
                            ? `Station ${routeStationId} is not in the current catalog.`
                            : 'Select a station to view its readings.'}
                    </p>
                )}

                {selectedStation && (
                    <div className="space-y-4">
                        <h2 className="text-xl font-semibold">Readings for {selectedStation.name}</h2>

                        {state.readingsStatus === 'loading' && (
                            <div className="flex items-center gap-2 text-muted-foreground">
                                <Loader2 className="h-4 w-4 animate-spin" /> Fetching station readings...
                            </div>
                        )}

                        {state.readingsStatus === 'error' && (
                            <div className="flex items-center gap-2 text-sm text-red-700 bg-red-50 border border-red-200 rounded-md px-3 py-2">
                                <AlertTriangle className="h-4 w-4" /> Data unavailable. {state.error}
                            </div>
                        )}

                        {state.readingsStatus === 'ready' && state.readings.length === 0 && (
                            <p className="text-sm text-amber-700 bg-amber-50 border border-amber-200 rounded-md px-3 py-2">
                                No readings available for this station in the last {preferences.windowHours} hours.
                            </p>
                        )}

                        {state.readingsStatus === 'ready' && activeSeries && (
                            <>
                                <p className="text-sm text-muted-foreground">
                                    Showing data from {formatTimestamp(state.readings[0].timestamp)} to{' '}
                                    {formatTimestamp(state.readings[state.readings.length - 1].timestamp)} UTC.
                                    Total readings: {state.readings.length}
                                    {dropped > 0 && ` (${dropped} incomplete records dropped)`}
                                </p>

                                {series.length > 1 && (
                                    <label className="flex items-center gap-2 text-sm">
                                        Measurement type
                                        <select
                                            value={activeSeries.key}
                                            onChange={(e) => setSelectedSeriesKey(e.target.value)}
                                            className="px-2 py-1 rounded-md border border-border bg-background"
                                        >
                                            {series.map(s => (
                                                <option key={s.key} value={s.key}>{s.label}</option>
                                            ))}
                                        </select>
                                    </label>
                                )}

                                <ReadingsChart series={activeSeries} />
                                <ReadingsTable readings={activeSeries.readings} onDownload={handleDownload} />
                            </>
                        )}
                    </div>
                )}

                {state.lastUpdated && (
                    <p className="text-xs text-muted-foreground">Last updated: {formatTimestamp(state.lastUpdated.toISOString())} UTC</p>
                )}
            </section>

            <StatusCenter tasks={tasks} onDismiss={(id) => setTasks(prev => prev.filter(t => t.id !== id))} />
        </div>
    );
}
