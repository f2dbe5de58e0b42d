import { EnvironmentAgencyService, ENVIRONMENT_AGENCY_CAPABILITIES } from './environment-agency';
import type { DataSource, DataSourceCapabilities, DataSourceOptions } from '../../types';

export type ProviderId = 'environment-agency';

export interface ProviderDefinition {
    id: ProviderId;
    name: string;
    description?: string;
    attribution: string;
    capabilities: DataSourceCapabilities;
    create: (options: DataSourceOptions) => DataSource;
}

const providers: Record<ProviderId, ProviderDefinition> = {
    'environment-agency': {
        id: 'environment-agency',
        name: 'Environment Agency flood monitoring',
        description: 'River level and flow readings from the Environment Agency real-time API',
        attribution: 'This uses Environment Agency flood and river level data from the real-time data API (Beta).',
        capabilities: ENVIRONMENT_AGENCY_CAPABILITIES,
        create: (options) => new EnvironmentAgencyService(options)
    }
};

const isProviderId = (id: string): id is ProviderId => Object.prototype.hasOwnProperty.call(providers, id);

export function createProvider(id: string, options: DataSourceOptions = {}): DataSource | null {
    if (!isProviderId(id)) return null;
    return providers[id].create(options);
}

export function listProviders(): ProviderDefinition[] {
    return Object.values(providers);
}

export function getProviderDefinition(id: string): ProviderDefinition | null {
    return isProviderId(id) ? providers[id] : null;
}

export function getProviderCapabilities(id: string): DataSourceCapabilities | null {
    return getProviderDefinition(id)?.capabilities ?? null;
}
