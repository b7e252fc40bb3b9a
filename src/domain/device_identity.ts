import { v4 as uuidv4 } from 'uuid';
import { Logger } from 'pino';
import { IConfigurationStore } from './repository';
import { PersistenceWriteFailure } from './errors';

export interface DeviceIdentityResult {
    deviceId: string;
    created: boolean;
    warning?: PersistenceWriteFailure;
}

/**
 * Stable synthetic device identifier, persisted next to the configurations.
 * Generated once per store file and never regenerated.
 */
export class DeviceIdentity {
    constructor(
        private readonly store: IConfigurationStore,
        private readonly logger: Logger,
        private readonly generate: () => string = uuidv4
    ) { }

    getOrCreate(): DeviceIdentityResult {
        const existing = this.store.getDeviceId();
        if (existing) {
            return { deviceId: existing, created: false };
        }

        const deviceId = this.generate();
        const warning = this.store.setDeviceId(deviceId);
        this.logger.info({ deviceId }, 'Generated new device id');

        return warning ? { deviceId, created: true, warning } : { deviceId, created: true };
    }
}
