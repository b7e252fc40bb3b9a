import { z } from 'zod';
import { ConfigurationInput, VehicleConfiguration } from './models';

export type ValidationResult<T> =
    | { ok: true; value: T }
    | { ok: false; issues: string[] };

const ConfigurationInputSchema = z.object({
    radioId: z.string()
        .transform(value => value.trim().toUpperCase())
        .pipe(z.string().min(1, 'Radio ID cannot be empty.')),
    make: z.string().transform(value => value.trim()),
    model: z.string().transform(value => value.trim()),
    year: z.string()
        .transform(value => value.trim())
        .pipe(z.string().regex(/^[0-9]{4}$/, 'Year must be a 4-digit number.')),
});

/**
 * Normalizes and validates operator input for a new configuration.
 * Pure: the caller decides whether to re-prompt or reject.
 */
export function validateConfigurationInput(
    input: ConfigurationInput,
    existingRadioIds: Iterable<string> = []
): ValidationResult<VehicleConfiguration> {
    const parsed = ConfigurationInputSchema.safeParse(input);
    if (!parsed.success) {
        return { ok: false, issues: parsed.error.issues.map(issue => issue.message) };
    }

    const { radioId, make, model, year } = parsed.data;
    for (const existing of existingRadioIds) {
        if (existing === radioId) {
            return { ok: false, issues: [`Radio ID ${radioId} already exists.`] };
        }
    }

    return { ok: true, value: { RadioID: radioId, Make: make, Model: model, Year: year } };
}

/**
 * Single-field checks used by the interactive prompts.
 */
export function normalizeRadioId(raw: string): ValidationResult<string> {
    const value = raw.trim().toUpperCase();
    return value ? { ok: true, value } : { ok: false, issues: ['Radio ID cannot be empty.'] };
}

export function normalizeYear(raw: string): ValidationResult<string> {
    const value = raw.trim();
    return /^[0-9]{4}$/.test(value)
        ? { ok: true, value }
        : { ok: false, issues: ['Year must be a 4-digit number.'] };
}
