/**
 * A vehicle/radio pairing the operator can activate.
 * Field names match the persisted configuration file.
 */
export interface VehicleConfiguration {
    RadioID: string;    // Upper-cased, unique within the store
    Make: string;
    Model: string;
    Year: string;       // Exactly four digits
}

/**
 * Raw, unvalidated input for a new configuration (as typed by the operator).
 */
export interface ConfigurationInput {
    radioId: string;
    make: string;
    model: string;
    year: string;
}

/**
 * Ledger entry written after a complete workflow run.
 */
export interface ActivationRecord {
    activated: boolean;
    last_activated: string; // ISO 8601
}

export type ActivationStatus = {
    activated: boolean;
    lastActivated: string; // ISO 8601 or 'unknown'
};

/**
 * Values threaded between workflow steps. Lives for one run only.
 */
export interface SessionState {
    authToken?: string;
    sequenceValue?: string;
}

export type SessionKey = keyof SessionState;

export function createSession(): SessionState {
    return {};
}

export const UNKNOWN_TIMESTAMP = 'unknown';
