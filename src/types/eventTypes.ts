import { BackendConfig, Config, GatewaySettings } from './configTypes.js';

// --- Event Names ---
export const ConfigEvents = {
    CONFIG_ERROR: 'configError', // Error during reload
    BACKEND_ADDED: 'backendAdded',
    BACKEND_REMOVED: 'backendRemoved',
    BACKEND_UPDATED: 'backendUpdated',
    SETTINGS_UPDATED: 'settingsUpdated',
    CONFIG_CHANGED_PROCESSED: 'configChangedProcessed' // Emitted once per effective load, after the specific events
} as const;

export const SessionEvents = {
    STATE_CHANGE: 'stateChange',
    OPERATIONS_CHANGED: 'operationsChanged',
} as const;

export const RegistryEvents = {
    ROUTES_CHANGED: 'routesChanged',
} as const;

// --- Event Payload Types ---

export interface BackendAddedPayload {
    backendId: string;
    config: BackendConfig;
}

export interface BackendRemovedPayload {
    backendId: string;
}

export interface BackendUpdatedPayload {
    backendId: string;
    newConfig: BackendConfig;
    oldConfig: BackendConfig;
}

export interface SettingsUpdatedPayload {
    newSettings: GatewaySettings;
    oldSettings: GatewaySettings;
}

export interface ConfigProcessedPayload {
    newConfig: Config;
    oldConfig: Config | null;
}
