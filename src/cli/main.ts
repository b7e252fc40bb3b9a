#!/usr/bin/env node
import * as dotenv from 'dotenv';
import chalk from 'chalk';
import { Logger } from 'pino';
import { AppSettings, loadSettings, SettingsError } from '../config/settings';
import { createFileLogger } from '../logger';
import { ConfigurationStore } from '../infrastructure/configuration_store';
import { ActivationLedger } from '../infrastructure/activation_ledger';
import { DeviceIdentity } from '../domain/device_identity';
import { normalizeRadioId, normalizeYear } from '../domain/configuration_validator';
import { VehicleConfiguration } from '../domain/models';
import { SessionClient } from '../api/session_client';
import { ActivationOutcome, ActivationService } from '../application/activation_service';
import { closePrompts, pause, promptNumber, promptText, promptValid, promptYesNo, setInterruptHandler } from './prompts';

// 1. Load Config Early
dotenv.config();

let closeLog: () => Promise<void> = () => Promise.resolve();

function shutdown(code: number): void {
    closePrompts();
    void closeLog()
        .catch((error: unknown) => {
            console.error('Failed to flush the log file:', error instanceof Error ? error.message : error);
        })
        .finally(() => process.exit(code));
}

function warn(error: Error | undefined): void {
    if (error) console.error(chalk.red(`❌ ${error.message}`));
}

async function addConfiguration(store: ConfigurationStore): Promise<VehicleConfiguration> {
    console.log('Adding a new configuration entry:');
    while (true) {
        const radioId = await promptValid('Radio ID', normalizeRadioId);
        const make = await promptText('Vehicle Make');
        const model = await promptText('Vehicle Model');
        const year = await promptValid('Vehicle Year (YYYY)', normalizeYear);

        const result = store.add({ radioId, make, model, year });
        if (result.ok) {
            warn(result.warning);
            return result.configuration;
        }
        for (const issue of result.issues) console.log(chalk.yellow(`  ${issue}`));
    }
}

async function selectConfiguration(store: ConfigurationStore, service: ActivationService): Promise<VehicleConfiguration> {
    const summaries = service.listConfigurations();
    if (summaries.length === 0) {
        console.log('No configurations available. Please add one.');
        return addConfiguration(store);
    }

    console.log('Available configurations:');
    summaries.forEach(({ configuration: c, status }, i) => {
        const label = status.activated ? chalk.green('Activated') : chalk.dim('Not Activated');
        const last = status.activated ? status.lastActivated : 'N/A';
        console.log(`${i + 1}. ${c.Make} ${c.Model} (${c.Year}) - Radio ID: ${c.RadioID} [${label} | Last: ${last}]`);
    });

    const choice = await promptNumber('Select a configuration by number (or 0 to add a new one)', 0, summaries.length);
    if (choice === 0) return addConfiguration(store);
    return summaries[choice - 1].configuration;
}

function report(outcome: ActivationOutcome): void {
    switch (outcome.status) {
        case 'skipped':
            console.log('Activation skipped.');
            break;
        case 'failure':
            console.error(chalk.red(`✗ Workflow terminated at '${outcome.step}' due to error: ${outcome.error.message}`));
            break;
        case 'success':
            warn(outcome.warning);
            console.log(`Configuration marked as activated on ${outcome.activatedAt}`);
            console.log(chalk.green('✓ Activation completed successfully.'));
            break;
    }
}

async function runLoop(store: ConfigurationStore, service: ActivationService, logger: Logger): Promise<void> {
    while (true) {
        const selected = await selectConfiguration(store, service);
        console.log(`Selected configuration: ${selected.Make} ${selected.Model} (${selected.Year}) - Radio ID: ${selected.RadioID}`);

        const outcome = await service.activate(selected, {
            confirmReactivation: async (_radioId, lastActivated) => {
                console.log(`This configuration was already activated on ${lastActivated}.`);
                return promptYesNo('Do you want to force reactivation?');
            },
            onStep: (step, index, total) => {
                if (index === 0) console.log('Starting the activation workflow...');
                console.log(chalk.cyan(`[${index + 1}/${total}] ${step.label}`));
            },
        });

        logger.info({ radioId: selected.RadioID, status: outcome.status }, 'Selection cycle finished');
        report(outcome);
        await pause('Press Enter to return to configuration selection (or Ctrl+C to exit)...');
    }
}

// 2. Fail-Fast Validation
function loadSettingsOrExit(): AppSettings {
    try {
        return loadSettings();
    } catch (error) {
        if (error instanceof SettingsError) {
            console.error(`❌ STARTUP FATAL: ${error.message}`);
            process.exit(1);
        }
        throw error;
    }
}

async function main(): Promise<void> {
    const settings = loadSettingsOrExit();

    const { logger, close } = createFileLogger({ file: settings.logFile, level: settings.logLevel });
    closeLog = close;
    logger.info('================================================');
    logger.info({ startedAt: new Date().toISOString() }, 'New run started');

    setInterruptHandler(() => {
        console.log('\nExiting...');
        logger.info('Run ended by operator');
        shutdown(0);
    });

    const store = new ConfigurationStore(settings.configFile, logger);
    warn(store.load());

    const ledger = new ActivationLedger(settings.ledgerFile, logger);
    warn(ledger.load());

    const identity = new DeviceIdentity(store, logger).getOrCreate();
    warn(identity.warning);

    const gateway = new SessionClient({ baseUrl: settings.apiBaseUrl, deviceId: identity.deviceId, logger });
    const service = new ActivationService({
        configurations: store,
        ledger,
        gateway,
        settings: settings.workflow,
        deviceId: identity.deviceId,
        logger,
    });

    await runLoop(store, service, logger);
}

main().catch((error: unknown) => {
    console.error('💥 Unexpected error:', error instanceof Error ? error.message : error);
    shutdown(1);
});
