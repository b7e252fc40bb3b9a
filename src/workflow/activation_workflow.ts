import { Logger } from 'pino';
import { createSession, SessionState } from '../domain/models';
import { IActivationLedger } from '../domain/repository';
import { PersistenceWriteFailure, PreconditionFailure } from '../domain/errors';
import { ActivationGateway, RawResponse } from '../api/session_client';
import {
    ACTIVATION_STEPS,
    ExtractionRule,
    resolveTarget,
    StepContext,
    StepDefinition,
    WorkflowSettings,
} from './activation_steps';

/**
 * 1. DEFINITIONS: Public and Internal Types
 */

export interface WorkflowInput {
    radioId: string;
    deviceId: string;
}

export interface WorkflowDeps {
    gateway: ActivationGateway;
    ledger: IActivationLedger;
    settings: WorkflowSettings;
    logger: Logger;
    steps?: readonly StepDefinition[];
    clock?: () => Date;
    onStep?: (step: StepDefinition, index: number, total: number) => void;
}

export type WorkflowResult =
    | {
        status: 'success';
        radioId: string;
        activatedAt: string;
        completedSteps: string[];
        warning?: PersistenceWriteFailure;
    }
    | { status: 'failure'; radioId: string; step: string; error: Error; completedSteps: string[] };

type StepResult =
    | { status: 'success'; session: SessionState }
    | { status: 'failure'; error: Error };

/**
 * 2. STEP RUNNER
 */

async function runStep(step: StepDefinition, ctx: StepContext, deps: WorkflowDeps): Promise<StepResult> {
    for (const key of step.requires) {
        if (!ctx.session[key]) {
            return { status: 'failure', error: new PreconditionFailure(step.name, key) };
        }
    }

    let response: RawResponse;
    try {
        response = await deps.gateway.post(
            resolveTarget(step, ctx.settings),
            step.fields(ctx),
            {
                session: ctx.session,
                headers: step.headers ? step.headers(ctx) : undefined,
                params: step.query ? step.query(ctx) : undefined,
            }
        );
    } catch (e) {
        // RequestFailure (and anything unexpected) is surfaced unchanged.
        return { status: 'failure', error: e instanceof Error ? e : new Error(String(e)) };
    }

    deps.logger.debug({ step: step.name, body: response.body }, 'Step response');

    if (!step.extract) {
        return { status: 'success', session: ctx.session };
    }

    const extracted = extractValue(response.body, step.extract);
    if (extracted.status === 'missing') {
        return { status: 'failure', error: step.extract.onMissing(step.name, extracted.detail) };
    }

    deps.logger.info({ step: step.name, field: step.extract.into }, 'Session value retrieved');
    return { status: 'success', session: { ...ctx.session, [step.extract.into]: extracted.value } };
}

type Extraction = { status: 'found'; value: string } | { status: 'missing'; detail: string };

export function extractValue(body: string, rule: ExtractionRule): Extraction {
    let current: unknown;
    try {
        current = JSON.parse(body);
    } catch {
        return { status: 'missing', detail: 'response is not valid JSON' };
    }

    for (const key of rule.path) {
        if (typeof current !== 'object' || current === null || !(key in current)) {
            return { status: 'missing', detail: `no '${rule.path.join('.')}' field` };
        }
        current = Reflect.get(current, key);
    }

    if (typeof current === 'number') current = String(current);
    if (typeof current !== 'string' || current.length === 0) {
        return { status: 'missing', detail: `empty '${rule.path.join('.')}' field` };
    }
    return { status: 'found', value: current };
}

/**
 * 3. ORCHESTRATOR (Public Function)
 *
 * Runs every step in order with a fresh session. The ledger is written only
 * after the last step succeeds; any failure leaves it exactly as it was.
 */
export async function runActivationWorkflow(
    input: WorkflowInput,
    deps: WorkflowDeps
): Promise<WorkflowResult> {
    const steps = deps.steps ?? ACTIVATION_STEPS;
    const clock = deps.clock ?? (() => new Date());
    const completedSteps: string[] = [];

    let session = createSession();

    deps.logger.info({ radioId: input.radioId, steps: steps.length }, 'Starting activation workflow');

    for (const [index, step] of steps.entries()) {
        deps.onStep?.(step, index, steps.length);

        const ctx: StepContext = {
            radioId: input.radioId,
            deviceId: input.deviceId,
            session,
            settings: deps.settings,
        };
        const result = await runStep(step, ctx, deps);

        if (result.status === 'failure') {
            deps.logger.error(
                { radioId: input.radioId, step: step.name, err: result.error },
                'Workflow terminated'
            );
            return {
                status: 'failure',
                radioId: input.radioId,
                step: step.name,
                error: result.error,
                completedSteps,
            };
        }

        session = result.session;
        completedSteps.push(step.name);
    }

    const activatedAt = clock().toISOString();
    const warning = deps.ledger.markActivated(input.radioId, activatedAt);
    deps.logger.info({ radioId: input.radioId, activatedAt }, 'Activation workflow completed');

    return warning
        ? { status: 'success', radioId: input.radioId, activatedAt, completedSteps, warning }
        : { status: 'success', radioId: input.radioId, activatedAt, completedSteps };
}
