import { SessionKey } from './models';

/**
 * Store file exists but could not be read or parsed.
 * Recovered locally: the store falls back to an empty structure.
 */
export class PersistenceReadFailure extends Error {
    constructor(public readonly file: string, cause: unknown) {
        super(`Could not read '${file}': ${describeCause(cause)}`, { cause });
        this.name = 'PersistenceReadFailure';
    }
}

/**
 * Store could not be written. In-memory state stays authoritative.
 */
export class PersistenceWriteFailure extends Error {
    constructor(public readonly file: string, cause: unknown) {
        super(`Could not save '${file}': ${describeCause(cause)}`, { cause });
        this.name = 'PersistenceWriteFailure';
    }
}

/**
 * Base for every failure the workflow engine raises itself
 * (as opposed to transport failures from the session client).
 */
export class WorkflowStepFailure extends Error {
    constructor(public readonly step: string, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'WorkflowStepFailure';
    }
}

export class AuthenticationFailure extends WorkflowStepFailure {
    constructor(step: string, detail: string) {
        super(step, `Authentication token missing in response: ${detail}`);
        this.name = 'AuthenticationFailure';
    }
}

export class SequenceMissing extends WorkflowStepFailure {
    constructor(step: string, detail: string) {
        super(step, `Missing sequence value in response: ${detail}`);
        this.name = 'SequenceMissing';
    }
}

export class PreconditionFailure extends WorkflowStepFailure {
    constructor(step: string, public readonly missing: SessionKey) {
        super(step, `Step '${step}' requires '${missing}' but it has not been set`);
        this.name = 'PreconditionFailure';
    }
}

export function describeCause(cause: unknown): string {
    return cause instanceof Error ? cause.message : String(cause);
}
