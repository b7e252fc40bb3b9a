import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { PersistenceReadFailure, PersistenceWriteFailure } from '../domain/errors';

export type ReadOutcome<T> =
    | { status: 'missing' }
    | { status: 'loaded'; value: T }
    | { status: 'corrupt'; error: PersistenceReadFailure };

/**
 * Reads and validates a JSON document. Never throws.
 */
export function readJsonFile<S extends z.ZodTypeAny>(file: string, schema: S): ReadOutcome<z.infer<S>> {
    if (!fs.existsSync(file)) {
        return { status: 'missing' };
    }

    try {
        const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
        const parsed = schema.safeParse(raw);
        if (!parsed.success) {
            const first = parsed.error.issues[0];
            const where = first && first.path.length > 0 ? ` at '${first.path.join('.')}'` : '';
            return {
                status: 'corrupt',
                error: new PersistenceReadFailure(file, `${first ? first.message : 'invalid document'}${where}`),
            };
        }
        return { status: 'loaded', value: parsed.data };
    } catch (error) {
        return { status: 'corrupt', error: new PersistenceReadFailure(file, error) };
    }
}

/**
 * Overwrites the file with pretty-printed JSON. Returns the failure instead of throwing.
 */
export function writeJsonFile(file: string, value: unknown): PersistenceWriteFailure | undefined {
    try {
        const dir = path.dirname(file);
        if (!fs.existsSync(dir)) {
            fs.mkdirSync(dir, { recursive: true });
        }
        fs.writeFileSync(file, JSON.stringify(value, null, 4), 'utf8');
        return undefined;
    } catch (error) {
        return new PersistenceWriteFailure(file, error);
    }
}
