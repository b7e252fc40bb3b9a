import { Logger } from 'pino';
import { z } from 'zod';
import { ActivationRecord, ActivationStatus, UNKNOWN_TIMESTAMP } from '../domain/models';
import { IActivationLedger } from '../domain/repository';
import { PersistenceReadFailure, PersistenceWriteFailure } from '../domain/errors';
import { readJsonFile, writeJsonFile } from './json_file';

const ActivationRecordSchema = z.object({
    activated: z.boolean(),
    last_activated: z.string().default(UNKNOWN_TIMESTAMP),
});

// Read side of an entry that fails the strict schema: whatever can be salvaged.
const SalvagedRecordSchema = z.object({
    activated: z.boolean().catch(true),
    last_activated: z.string().catch(UNKNOWN_TIMESTAMP),
}).catch({ activated: true, last_activated: UNKNOWN_TIMESTAMP });

// Only a non-object top level makes the file corrupt; entries are checked one by one.
const LedgerFileSchema = z.record(z.string(), z.unknown());

interface LedgerEntry {
    record: ActivationRecord;
    // Written back as-is until the entry is replaced.
    raw: unknown;
}

/**
 * JSON-file backed activation ledger.
 * Any entry for a radio counts as an activation, whatever its `activated` flag says.
 */
export class ActivationLedger implements IActivationLedger {
    private entries = new Map<string, LedgerEntry>();

    constructor(
        private readonly file: string,
        private readonly logger: Logger
    ) { }

    load(): PersistenceReadFailure | undefined {
        const outcome = readJsonFile(this.file, LedgerFileSchema);
        this.entries = new Map();

        if (outcome.status === 'corrupt') {
            this.logger.error({ file: this.file, err: outcome.error }, 'Error loading activation log file');
            return outcome.error;
        }
        if (outcome.status === 'loaded') {
            for (const [radioId, raw] of Object.entries(outcome.value)) {
                const parsed = ActivationRecordSchema.safeParse(raw);
                if (parsed.success) {
                    this.entries.set(radioId, { record: parsed.data, raw: parsed.data });
                    continue;
                }
                this.logger.warn(
                    { file: this.file, radioId, issues: parsed.error.issues.map(i => i.message) },
                    'Activation log entry has an unexpected shape, keeping it as is'
                );
                this.entries.set(radioId, { record: SalvagedRecordSchema.parse(raw), raw });
            }
        }

        this.logger.info({ file: this.file, count: this.entries.size }, 'Activation log loaded');
        return undefined;
    }

    save(): PersistenceWriteFailure | undefined {
        const document: Record<string, unknown> = {};
        for (const [radioId, entry] of this.entries) {
            document[radioId] = entry.raw;
        }

        const failure = writeJsonFile(this.file, document);
        if (failure) {
            this.logger.error({ file: this.file, err: failure }, 'Failed to save activation log');
            return failure;
        }
        this.logger.info({ file: this.file }, 'Activation log successfully saved');
        return undefined;
    }

    isActivated(radioId: string): ActivationStatus {
        const entry = this.entries.get(radioId);
        if (!entry) {
            return { activated: false, lastActivated: UNKNOWN_TIMESTAMP };
        }
        return { activated: true, lastActivated: entry.record.last_activated || UNKNOWN_TIMESTAMP };
    }

    find(radioId: string): ActivationRecord | undefined {
        const entry = this.entries.get(radioId);
        return entry ? { ...entry.record } : undefined;
    }

    markActivated(radioId: string, timestamp: string): PersistenceWriteFailure | undefined {
        const record: ActivationRecord = { activated: true, last_activated: timestamp };
        this.entries.set(radioId, { record, raw: { ...record } });
        this.logger.info({ radioId, timestamp }, 'Configuration marked as activated');
        return this.save();
    }
}
