import { DEFAULT_APP_KEY, DEFAULT_APP_SECRET, loadSettings, SettingsError } from '../../src/config/settings';

describe('loadSettings', () => {
    test('falls back to embedded defaults when nothing is set', () => {
        const settings = loadSettings({});

        expect(settings.workflow.appKey).toBe(DEFAULT_APP_KEY);
        expect(settings.workflow.appSecret).toBe(DEFAULT_APP_SECRET);
        expect(settings.configFile).toBe('config.json');
        expect(settings.ledgerFile).toBe('activation_log.json');
        expect(settings.logFile).toBe('activation.log');
        expect(settings.logLevel).toBe('info');
    });

    test('environment overrides credentials and hosts', () => {
        const settings = loadSettings({
            ACTIVATION_APP_KEY: 'env-key',
            ACTIVATION_APP_SECRET: 'env-secret',
            ACTIVATION_API_BASE_URL: 'https://api.test',
            ACTIVATION_ELIGIBILITY_URL: 'https://external.test/status',
            LOG_LEVEL: 'debug',
        });

        expect(settings.apiBaseUrl).toBe('https://api.test');
        expect(settings.workflow).toEqual({
            appKey: 'env-key',
            appSecret: 'env-secret',
            eligibilityUrl: 'https://external.test/status',
            eligibilityAddress: '100 MAIN ST, SPRINGFIELD, ST 00000, USA',
        });
        expect(settings.logLevel).toBe('debug');
    });

    test('blank values count as unset', () => {
        expect(loadSettings({ ACTIVATION_APP_KEY: '   ' }).workflow.appKey).toBe(DEFAULT_APP_KEY);
    });

    test('FAIL: invalid host and log level', () => {
        expect(() => loadSettings({ ACTIVATION_API_BASE_URL: 'not a url' })).toThrow(SettingsError);
        expect(() => loadSettings({ LOG_LEVEL: 'loud' })).toThrow(/LOG_LEVEL/);
    });
});
