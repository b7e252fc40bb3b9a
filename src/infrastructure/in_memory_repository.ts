import { ActivationRecord, ActivationStatus, ConfigurationInput, UNKNOWN_TIMESTAMP, VehicleConfiguration } from '../domain/models';
import { AddConfigurationResult, IActivationLedger, IConfigurationStore } from '../domain/repository';
import { validateConfigurationInput } from '../domain/configuration_validator';

export class InMemoryActivationLedger implements IActivationLedger {
    private records: Map<string, ActivationRecord> = new Map();
    public saveCount = 0;

    constructor(seed: Record<string, ActivationRecord> = {}) {
        for (const [radioId, record] of Object.entries(seed)) {
            this.records.set(radioId, { ...record });
        }
    }

    load(): undefined {
        return undefined;
    }

    save(): undefined {
        this.saveCount++;
        return undefined;
    }

    isActivated(radioId: string): ActivationStatus {
        const record = this.records.get(radioId);
        return record
            ? { activated: true, lastActivated: record.last_activated || UNKNOWN_TIMESTAMP }
            : { activated: false, lastActivated: UNKNOWN_TIMESTAMP };
    }

    find(radioId: string): ActivationRecord | undefined {
        const record = this.records.get(radioId);
        return record ? { ...record } : undefined;
    }

    markActivated(radioId: string, timestamp: string): undefined {
        this.records.set(radioId, { activated: true, last_activated: timestamp });
        return this.save();
    }
}

export class InMemoryConfigurationStore implements IConfigurationStore {
    private configurations: VehicleConfiguration[] = [];
    private deviceId?: string;
    public saveCount = 0;

    load(): undefined {
        return undefined;
    }

    save(): undefined {
        this.saveCount++;
        return undefined;
    }

    add(input: ConfigurationInput): AddConfigurationResult {
        const result = validateConfigurationInput(input, this.configurations.map(c => c.RadioID));
        if (!result.ok) return result;

        this.configurations.push({ ...result.value });
        this.save();
        return { ok: true, configuration: { ...result.value } };
    }

    list(): VehicleConfiguration[] {
        return this.configurations.map(c => ({ ...c }));
    }

    find(radioId: string): VehicleConfiguration | undefined {
        const found = this.configurations.find(c => c.RadioID === radioId.trim().toUpperCase());
        return found ? { ...found } : undefined;
    }

    getDeviceId(): string | undefined {
        return this.deviceId;
    }

    setDeviceId(deviceId: string): undefined {
        this.deviceId = deviceId;
        return this.save();
    }
}
