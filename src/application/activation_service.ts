import { Logger } from 'pino';
import { ActivationStatus, VehicleConfiguration } from '../domain/models';
import { IActivationLedger, IConfigurationStore } from '../domain/repository';
import { ActivationGateway } from '../api/session_client';
import { StepDefinition, WorkflowSettings } from '../workflow/activation_steps';
import { runActivationWorkflow, WorkflowResult } from '../workflow/activation_workflow';

export interface ConfigurationSummary {
    configuration: VehicleConfiguration;
    status: ActivationStatus;
}

export type ActivationOutcome =
    | WorkflowResult
    | { status: 'skipped'; radioId: string; lastActivated: string };

export interface ActivateOptions {
    /**
     * Asked only when the radio already has a ledger entry.
     */
    confirmReactivation: (radioId: string, lastActivated: string) => Promise<boolean>;
    onStep?: (step: StepDefinition, index: number, total: number) => void;
}

export interface ActivationServiceDeps {
    configurations: IConfigurationStore;
    ledger: IActivationLedger;
    gateway: ActivationGateway;
    settings: WorkflowSettings;
    deviceId: string;
    logger: Logger;
    steps?: readonly StepDefinition[];
    clock?: () => Date;
}

/**
 * One selection cycle: ledger gate, optional confirmation, then the workflow.
 */
export class ActivationService {
    constructor(private readonly deps: ActivationServiceDeps) { }

    listConfigurations(): ConfigurationSummary[] {
        return this.deps.configurations.list().map(configuration => ({
            configuration,
            status: this.deps.ledger.isActivated(configuration.RadioID),
        }));
    }

    async activate(configuration: VehicleConfiguration, options: ActivateOptions): Promise<ActivationOutcome> {
        const radioId = configuration.RadioID;
        const { activated, lastActivated } = this.deps.ledger.isActivated(radioId);

        if (activated) {
            const force = await options.confirmReactivation(radioId, lastActivated);
            if (!force) {
                this.deps.logger.info({ radioId, lastActivated }, 'Reactivation declined, workflow skipped');
                return { status: 'skipped', radioId, lastActivated };
            }
            this.deps.logger.info({ radioId, lastActivated }, 'Forcing reactivation');
        }

        return runActivationWorkflow(
            { radioId, deviceId: this.deps.deviceId },
            {
                gateway: this.deps.gateway,
                ledger: this.deps.ledger,
                settings: this.deps.settings,
                logger: this.deps.logger,
                steps: this.deps.steps,
                clock: this.deps.clock,
                onStep: options.onStep,
            }
        );
    }
}
