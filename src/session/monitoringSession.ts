import type { DataSource, DropCounts, FilterCriteria, Reading, ReadingWindow, Station } from '../types';
import { buildCatalog, filterStations } from '../lib/catalog';
import { emptyDropCounts, normalizeReadings } from '../lib/readings';
import { logger } from '../lib/logger';
import { resolveWindow } from '../lib/dateUtils';
import { isTransportError } from '../services/errors';

export type LoadStatus = 'idle' | 'loading' | 'ready' | 'error';

export interface SessionDiagnostics {
    skippedStations: number;
    dropped: DropCounts;
}

export interface SessionState {
    catalog: Station[];
    catalogStatus: LoadStatus;
    criteria: FilterCriteria;
    filtered: Station[];
    selectedStationId?: string;
    readings: Reading[];
    readingsStatus: LoadStatus;
    diagnostics: SessionDiagnostics;
    error?: string;
    lastUpdated?: Date;
}

export type SessionEvent =
    | { type: 'load' }
    | { type: 'refresh' }
    | { type: 'filter'; criteria: FilterCriteria }
    | { type: 'select'; stationId: string; window?: Partial<ReadingWindow> }
    | { type: 'clear' };

type Listener = () => void;

export const initialSessionState = (): SessionState => ({
    catalog: [],
    catalogStatus: 'idle',
    criteria: {},
    filtered: [],
    readings: [],
    readingsStatus: 'idle',
    diagnostics: { skippedStations: 0, dropped: emptyDropCounts() }
});

export const CATALOG_UNAVAILABLE = 'Station data unavailable. Please try again later.';
export const READINGS_UNAVAILABLE = 'Readings unavailable for this station right now.';

/**
 * Session-scoped dashboard state. Each user interaction is dispatched as an
 * event that runs the fetch, normalize and publish steps and replaces the
 * affected slice of state.
 */
export class MonitoringSession {
    private state: SessionState = initialSessionState();
    private listeners = new Set<Listener>();
    private selectSeq = 0;

    constructor(private source: DataSource, private now: () => Date = () => new Date()) { }

    getSnapshot = (): SessionState => this.state;

    subscribe = (listener: Listener): (() => void) => {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    };

    get selectedStation(): Station | undefined {
        const id = this.state.selectedStationId;
        return id === undefined ? undefined : this.state.catalog.find(s => s.id === id);
    }

    dispatch(event: SessionEvent): Promise<void> {
        switch (event.type) {
            case 'load':
                return this.refreshCatalog(false);
            case 'refresh':
                return this.refreshCatalog(true);
            case 'filter':
                this.setCriteria(event.criteria);
                return Promise.resolve();
            case 'select':
                return this.selectStation(event.stationId, event.window);
            case 'clear':
                this.selectSeq += 1;
                this.update({
                    selectedStationId: undefined,
                    readings: [],
                    readingsStatus: 'idle',
                    error: undefined,
                    diagnostics: { ...this.state.diagnostics, dropped: emptyDropCounts() }
                });
                return Promise.resolve();
        }
    }

    private async refreshCatalog(bypassCache: boolean): Promise<void> {
        this.update({ catalogStatus: 'loading', error: undefined });

        try {
            const raw = await this.source.fetchStations({ bypassCache });
            const { stations, skipped } = buildCatalog(raw);
            const selectionLost = this.state.selectedStationId !== undefined
                && !stations.some(s => s.id === this.state.selectedStationId);

            if (selectionLost) {
                this.selectSeq += 1;
                logger.info(`Selected station ${this.state.selectedStationId} is no longer in the catalog`);
            }

            this.update({
                catalog: stations,
                catalogStatus: 'ready',
                filtered: filterStations(stations, this.state.criteria),
                diagnostics: { ...this.state.diagnostics, skippedStations: skipped },
                lastUpdated: this.now(),
                ...(selectionLost
                    ? { selectedStationId: undefined, readings: [], readingsStatus: 'idle' as const }
                    : {})
            });
        } catch (error) {
            if (!isTransportError(error)) throw error;
            logger.error('Failed to load stations', error.message);
            // Readings may only reference stations in the current catalog.
            this.selectSeq += 1;
            this.update({
                catalog: [],
                filtered: [],
                catalogStatus: 'error',
                error: CATALOG_UNAVAILABLE,
                selectedStationId: undefined,
                readings: [],
                readingsStatus: 'idle',
                diagnostics: { ...this.state.diagnostics, dropped: emptyDropCounts() }
            });
        }
    }

    private setCriteria(criteria: FilterCriteria) {
        this.update({ criteria, filtered: filterStations(this.state.catalog, criteria) });
    }

    private async selectStation(stationId: string, window: Partial<ReadingWindow> = {}): Promise<void> {
        // Throws RangeError for an inverted or invalid window before anything changes.
        resolveWindow(window.start, window.end, this.now());

        const seq = ++this.selectSeq;
        const station = this.state.catalog.find(s => s.id === stationId);

        if (!station) {
            logger.warn(`Ignoring selection of unknown station ${stationId}`);
            this.update({
                selectedStationId: undefined,
                readings: [],
                readingsStatus: 'ready',
                diagnostics: { ...this.state.diagnostics, dropped: emptyDropCounts() }
            });
            return;
        }

        this.update({ selectedStationId: stationId, readings: [], readingsStatus: 'loading', error: undefined });

        try {
            const raw = await this.source.fetchReadings(station.id, window.start, window.end);
            if (seq !== this.selectSeq) return;

            const { readings, dropped } = normalizeReadings(raw, station);
            this.update({
                readings,
                readingsStatus: 'ready',
                diagnostics: { ...this.state.diagnostics, dropped },
                lastUpdated: this.now()
            });
        } catch (error) {
            if (seq !== this.selectSeq) {
                if (isTransportError(error)) return;
                throw error;
            }
            this.update({ readings: [], readingsStatus: 'error', error: READINGS_UNAVAILABLE });
            if (!isTransportError(error)) throw error;
            logger.error(`Failed to load readings for ${stationId}`, error.message);
        }
    }

    private update(patch: Partial<SessionState>) {
        this.state = { ...this.state, ...patch };
        this.listeners.forEach(listener => listener());
    }
}
