import { ActivationRecord, ActivationStatus, ConfigurationInput, VehicleConfiguration } from './models';
import { PersistenceReadFailure, PersistenceWriteFailure } from './errors';

export type AddConfigurationResult =
    | { ok: true; configuration: VehicleConfiguration; warning?: PersistenceWriteFailure }
    | { ok: false; issues: string[] };

/**
 * Ordered collection of vehicle configurations plus the persisted device id.
 * Read and write failures are returned, never thrown.
 */
export interface IConfigurationStore {
    load(): PersistenceReadFailure | undefined;
    save(): PersistenceWriteFailure | undefined;

    /**
     * Validates, appends and persists immediately.
     * Invalid input leaves the store untouched.
     */
    add(input: ConfigurationInput): AddConfigurationResult;

    list(): VehicleConfiguration[];
    find(radioId: string): VehicleConfiguration | undefined;

    getDeviceId(): string | undefined;
    setDeviceId(deviceId: string): PersistenceWriteFailure | undefined;
}

/**
 * Durable RadioID -> ActivationRecord map. Gatekeeps reactivation.
 */
export interface IActivationLedger {
    load(): PersistenceReadFailure | undefined;
    save(): PersistenceWriteFailure | undefined;

    /**
     * `activated` is true whenever an entry exists for radioId.
     */
    isActivated(radioId: string): ActivationStatus;
    find(radioId: string): ActivationRecord | undefined;

    /**
     * Overwrites the entry for radioId and persists before returning.
     */
    markActivated(radioId: string, timestamp: string): PersistenceWriteFailure | undefined;
}
