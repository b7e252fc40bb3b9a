import { SessionKey, SessionState } from '../domain/models';
import {
    AuthenticationFailure,
    PreconditionFailure,
    SequenceMissing,
    WorkflowStepFailure,
} from '../domain/errors';
import { Fields } from '../api/session_client';

/**
 * 1. DEFINITIONS
 */

export interface WorkflowSettings {
    appKey: string;
    appSecret: string;
    eligibilityUrl: string;
    eligibilityAddress: string;
}

export interface StepContext {
    readonly radioId: string;
    readonly deviceId: string;
    readonly session: Readonly<SessionState>;
    readonly settings: WorkflowSettings;
}

export type StepTarget =
    | { kind: 'path'; path: string }
    | { kind: 'external'; url: (settings: WorkflowSettings) => string };

export interface ExtractionRule {
    into: SessionKey;
    path: readonly string[];
    onMissing: (step: string, detail: string) => WorkflowStepFailure;
}

export interface StepDefinition {
    name: string;
    label: string;
    target: StepTarget;
    requires: readonly SessionKey[];
    headers?: (ctx: StepContext) => Record<string, string>;
    fields: (ctx: StepContext) => Fields;
    query?: (ctx: StepContext) => Fields;
    extract?: ExtractionRule;
}

/**
 * Fixed client metadata reported to the vendor.
 */
export const APP_VERSION = '3.1.0';
export const DEVICE_CATEGORY = 'iPhone';
export const DEVICE_MODEL = 'iPhone 6 Plus';
export const OS_VERSION = '12.5.7';
const SDK_VERSION = '9.5.36';
const GEO = { lat: '32.37436705', lng: '-86.210313195' };

/**
 * Reads a session value a step consumes. The engine checks `requires`
 * before building the request, so this only fires if the table is inconsistent.
 */
function required(ctx: StepContext, step: string, key: SessionKey): string {
    const value = ctx.session[key];
    if (!value) throw new PreconditionFailure(step, key);
    return value;
}

/**
 * 2. STEP TABLE (strict order)
 */
export const ACTIVATION_STEPS: readonly StepDefinition[] = [
    {
        name: 'login',
        label: 'User Login',
        target: { kind: 'path', path: '/authService/100000002/login' },
        requires: [],
        headers: ({ settings }) => ({
            'X-Platform-Type': 'ios',
            'X-SDK-Type': 'js',
            'X-SDK-Version': SDK_VERSION,
            'X-App-Key': settings.appKey,
            'X-App-Secret': settings.appSecret,
        }),
        fields: () => ({}),
        extract: {
            into: 'authToken',
            path: ['claims_token', 'value'],
            onMissing: (step, detail) => new AuthenticationFailure(step, detail),
        },
    },
    {
        name: 'versionCheck',
        label: 'Version Check',
        target: { kind: 'path', path: '/services/DealerAppService7/VersionControl' },
        requires: ['authToken'],
        fields: () => ({
            deviceCategory: DEVICE_CATEGORY,
            appver: APP_VERSION,
            deviceLocale: 'en_US',
            deviceModel: DEVICE_MODEL,
            deviceVersion: OS_VERSION,
            deviceType: '',
        }),
    },
    {
        name: 'retrieveProperties',
        label: 'Retrieve Device Properties',
        target: { kind: 'path', path: '/services/DealerAppService7/getProperties' },
        requires: ['authToken'],
        fields: () => ({}),
    },
    {
        name: 'updateDeviceStatus',
        label: 'Update Device Status',
        target: { kind: 'path', path: '/services/USUpdateDeviceSATRefresh/updateDeviceSATRefreshWithPriority' },
        requires: ['authToken'],
        fields: ({ radioId, deviceId }) => ({
            deviceId: radioId,
            appVersion: APP_VERSION,
            lng: GEO.lng,
            deviceID: deviceId,
            provisionPriority: '2',
            provisionType: 'activate',
            lat: GEO.lat,
        }),
        extract: {
            into: 'sequenceValue',
            path: ['seqValue'],
            onMissing: (step, detail) => new SequenceMissing(step, detail),
        },
    },
    {
        name: 'fetchCrmInformation',
        label: 'Retrieve CRM Account Plan Information',
        target: { kind: 'path', path: '/services/DemoConsumptionRules/GetCRMAccountPlanInformation' },
        requires: ['authToken', 'sequenceValue'],
        fields: (ctx) => ({
            seqVal: required(ctx, 'fetchCrmInformation', 'sequenceValue'),
            deviceId: ctx.radioId,
        }),
    },
    {
        name: 'updateExternalDatabase',
        label: 'Update External Database',
        target: { kind: 'path', path: '/services/DBSuccessUpdate/DBUpdateForGoogle' },
        requires: ['authToken', 'sequenceValue'],
        fields: (ctx) => ({
            OM_ELIGIBILITY_STATUS: 'Eligible',
            appVersion: APP_VERSION,
            flag: 'failure',
            Radio_ID: ctx.radioId,
            deviceID: ctx.deviceId,
            G_PLACES_REQUEST: '',
            OS_Version: `${DEVICE_CATEGORY} ${OS_VERSION}`,
            G_PLACES_RESPONSE: '',
            Confirmation_Status: 'SUCCESS',
            seqVal: required(ctx, 'updateExternalDatabase', 'sequenceValue'),
        }),
    },
    {
        name: 'blockDevice',
        label: 'Block Device',
        target: { kind: 'path', path: '/services/USBlockListDevice/BlockListDevice' },
        requires: ['authToken'],
        fields: ({ deviceId }) => ({ deviceId }),
    },
    {
        name: 'eligibilityCheck',
        label: 'Program Eligibility Check',
        target: { kind: 'external', url: (settings) => settings.eligibilityUrl },
        requires: [],
        fields: () => ({}),
        query: ({ settings }) => ({ google_addr: settings.eligibilityAddress }),
    },
    {
        name: 'createAccount',
        label: 'Create New Account',
        target: { kind: 'path', path: '/services/DealerAppService3/CreateAccount' },
        requires: ['authToken', 'sequenceValue'],
        fields: (ctx) => ({
            seqVal: required(ctx, 'createAccount', 'sequenceValue'),
            deviceId: ctx.radioId,
            oracleCXFailed: '1',
            appVersion: APP_VERSION,
        }),
    },
    {
        name: 'refreshForConfirmedCustomer',
        label: 'Refresh Device Status for Confirmed Customer',
        target: { kind: 'path', path: '/services/USUpdateDeviceRefreshForCC/updateDeviceSATRefreshWithPriority' },
        requires: ['authToken'],
        fields: ({ radioId, deviceId }) => ({
            deviceId: radioId,
            provisionPriority: '2',
            appVersion: APP_VERSION,
            device_Type: `${DEVICE_CATEGORY} ${DEVICE_MODEL}`,
            deviceID: deviceId,
            os_Version: `${DEVICE_CATEGORY} ${OS_VERSION}`,
            provisionType: 'activate',
        }),
    },
];

export function resolveTarget(step: StepDefinition, settings: WorkflowSettings): string {
    return step.target.kind === 'path' ? step.target.path : step.target.url(settings);
}
