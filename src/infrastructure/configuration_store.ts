import { Logger } from 'pino';
import { z } from 'zod';
import { ConfigurationInput, VehicleConfiguration } from '../domain/models';
import { AddConfigurationResult, IConfigurationStore } from '../domain/repository';
import { validateConfigurationInput } from '../domain/configuration_validator';
import { PersistenceReadFailure, PersistenceWriteFailure } from '../domain/errors';
import { readJsonFile, writeJsonFile } from './json_file';

const VehicleConfigurationSchema = z.object({
    RadioID: z.string(),
    Make: z.string(),
    Model: z.string(),
    Year: z.string(),
});

// Only the outer shape decides whether the file is corrupt; records and
// device_id are checked one by one. Unknown top-level keys survive a load/save cycle.
const ConfigurationFileSchema = z.object({
    configurations: z.array(z.unknown(), {
        required_error: "Missing or invalid 'configurations' list.",
        invalid_type_error: "Missing or invalid 'configurations' list.",
    }),
}).passthrough();

type ConfigurationFile = z.infer<typeof ConfigurationFileSchema>;

// Records that do not fit are kept verbatim so a save never drops them.
type StoredRecord =
    | { kind: 'valid'; configuration: VehicleConfiguration }
    | { kind: 'invalid'; raw: unknown };

/**
 * JSON-file backed configuration store.
 * The in-memory document is authoritative once loaded; every mutation is written through.
 */
export class ConfigurationStore implements IConfigurationStore {
    private document: ConfigurationFile = { configurations: [] };
    private records: StoredRecord[] = [];

    constructor(
        private readonly file: string,
        private readonly logger: Logger
    ) { }

    load(): PersistenceReadFailure | undefined {
        const outcome = readJsonFile(this.file, ConfigurationFileSchema);
        this.document = { configurations: [] };
        this.records = [];

        if (outcome.status === 'corrupt') {
            this.logger.error({ file: this.file, err: outcome.error }, 'Error loading config file');
            return outcome.error;
        }

        if (outcome.status === 'missing') {
            this.logger.info({ file: this.file }, 'Config file not found, starting empty');
            return undefined;
        }

        this.document = outcome.value;
        this.records = outcome.value.configurations.map((raw, index): StoredRecord => {
            const parsed = VehicleConfigurationSchema.safeParse(raw);
            if (parsed.success) {
                return { kind: 'valid', configuration: parsed.data };
            }
            this.logger.warn(
                { file: this.file, index, issues: parsed.error.issues.map(i => i.message) },
                'Skipping invalid configuration record'
            );
            return { kind: 'invalid', raw };
        });

        this.logger.info(
            { file: this.file, count: this.list().length, skipped: this.records.length - this.list().length },
            'Configuration loaded'
        );
        return undefined;
    }

    save(): PersistenceWriteFailure | undefined {
        const failure = writeJsonFile(this.file, {
            ...this.document,
            configurations: this.records.map(r => (r.kind === 'valid' ? r.configuration : r.raw)),
        });
        if (failure) {
            this.logger.error({ file: this.file, err: failure }, 'Failed to save configuration');
            return failure;
        }
        this.logger.info({ file: this.file }, 'Configuration successfully saved');
        return undefined;
    }

    add(input: ConfigurationInput): AddConfigurationResult {
        const existing = this.list().map(c => c.RadioID);
        const result = validateConfigurationInput(input, existing);
        if (!result.ok) {
            this.logger.warn({ issues: result.issues }, 'Rejected configuration input');
            return result;
        }

        const configuration = result.value;
        this.records.push({ kind: 'valid', configuration: { ...configuration } });
        this.logger.info({ radioId: configuration.RadioID }, 'Configuration added');

        const warning = this.save();
        return warning
            ? { ok: true, configuration: { ...configuration }, warning }
            : { ok: true, configuration: { ...configuration } };
    }

    list(): VehicleConfiguration[] {
        const configurations: VehicleConfiguration[] = [];
        for (const record of this.records) {
            if (record.kind === 'valid') configurations.push({ ...record.configuration });
        }
        return configurations;
    }

    find(radioId: string): VehicleConfiguration | undefined {
        const key = radioId.trim().toUpperCase();
        return this.list().find(c => c.RadioID === key);
    }

    /**
     * Only a non-empty string counts as a stored id.
     */
    getDeviceId(): string | undefined {
        const deviceId = this.document.device_id;
        return typeof deviceId === 'string' && deviceId.length > 0 ? deviceId : undefined;
    }

    setDeviceId(deviceId: string): PersistenceWriteFailure | undefined {
        this.document.device_id = deviceId;
        return this.save();
    }
}
