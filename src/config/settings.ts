import { z } from 'zod';
import { WorkflowSettings } from '../workflow/activation_steps';

// Placeholder credentials; real values come from the environment.
export const DEFAULT_APP_KEY = 'test-app-key';
export const DEFAULT_APP_SECRET = 'test-app-secret';

const EnvSchema = z.object({
    ACTIVATION_API_BASE_URL: z.string().url().default('https://dealer-api.example.com'),
    ACTIVATION_ELIGIBILITY_URL: z.string().url().default('https://eligibility.example.com/program_status'),
    ACTIVATION_APP_KEY: z.string().min(1).default(DEFAULT_APP_KEY),
    ACTIVATION_APP_SECRET: z.string().min(1).default(DEFAULT_APP_SECRET),
    ACTIVATION_ELIGIBILITY_ADDRESS: z.string().min(1).default('100 MAIN ST, SPRINGFIELD, ST 00000, USA'),
    ACTIVATION_CONFIG_FILE: z.string().min(1).default('config.json'),
    ACTIVATION_LEDGER_FILE: z.string().min(1).default('activation_log.json'),
    ACTIVATION_LOG_FILE: z.string().min(1).default('activation.log'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export interface AppSettings {
    apiBaseUrl: string;
    workflow: WorkflowSettings;
    configFile: string;
    ledgerFile: string;
    logFile: string;
    logLevel: z.infer<typeof EnvSchema>['LOG_LEVEL'];
}

export class SettingsError extends Error {
    constructor(public readonly issues: string[]) {
        super(`Invalid environment: ${issues.join('; ')}`);
        this.name = 'SettingsError';
    }
}

/**
 * Builds settings from environment variables. Empty strings count as unset.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): AppSettings {
    const cleaned: Record<string, string> = {};
    for (const key of Object.keys(EnvSchema.shape)) {
        const value = env[key];
        if (value !== undefined && value.trim() !== '') {
            cleaned[key] = value.trim();
        }
    }

    const parsed = EnvSchema.safeParse(cleaned);
    if (!parsed.success) {
        throw new SettingsError(parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
    }

    const e = parsed.data;
    return {
        apiBaseUrl: e.ACTIVATION_API_BASE_URL,
        workflow: {
            appKey: e.ACTIVATION_APP_KEY,
            appSecret: e.ACTIVATION_APP_SECRET,
            eligibilityUrl: e.ACTIVATION_ELIGIBILITY_URL,
            eligibilityAddress: e.ACTIVATION_ELIGIBILITY_ADDRESS,
        },
        configFile: e.ACTIVATION_CONFIG_FILE,
        ledgerFile: e.ACTIVATION_LEDGER_FILE,
        logFile: e.ACTIVATION_LOG_FILE,
        logLevel: e.LOG_LEVEL,
    };
}
