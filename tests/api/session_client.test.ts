import axios from 'axios';
import MockAdapter from 'axios-mock-adapter';
import { RequestFailure, SessionClient } from '../../src/api/session_client';
import { createSilentLogger } from '../../src/logger';

describe('SessionClient', () => {
    let mock: MockAdapter;
    let client: SessionClient;
    const baseUrl = 'https://api.test';
    const deviceId = 'device-123';

    beforeEach(() => {
        mock = new MockAdapter(axios);
        client = new SessionClient({ baseUrl, deviceId, logger: createSilentLogger() });
    });

    afterEach(() => {
        mock.restore();
    });

    describe('buildHeaders', () => {
        test('default set carries the device id and no auth header without a token', () => {
            const headers = client.buildHeaders({});

            expect(headers['X-Device-Id']).toBe(deviceId);
            expect(headers['X-Api-Version']).toBe('1.0');
            expect(headers['Content-Type']).toBe('application/x-www-form-urlencoded');
            expect(headers['X-Authorization']).toBeUndefined();
        });

        test('adds the session token and lets overrides win', () => {
            const headers = client.buildHeaders(
                { authToken: 'token-abc' },
                { 'Accept': 'application/json', 'X-App-Key': 'test-app-key' }
            );

            expect(headers['X-Authorization']).toBe('token-abc');
            expect(headers['Accept']).toBe('application/json');
            expect(headers['X-App-Key']).toBe('test-app-key');
        });
    });

    test('request: a POST without fields sends the query string and no body', async () => {
        mock.onPost('/services/status').reply(config => {
            expect(config.method).toBe('post');
            expect(config.params).toEqual({ sn: 'ABC1' });
            expect(config.data).toBeUndefined();
            return [200, 'OK'];
        });

        const response = await client.request({
            method: 'POST',
            url: '/services/status',
            headers: client.buildHeaders({}),
            params: { sn: 'ABC1' },
        });

        expect(response).toEqual({ status: 200, body: 'OK' });
    });

    test('post: sends form-encoded fields with merged headers and returns the raw body', async () => {
        mock.onPost('/services/echo').reply(config => {
            expect(config.headers?.['X-Device-Id']).toBe(deviceId);
            expect(config.headers?.['X-Authorization']).toBe('token-abc');
            const body = new URLSearchParams(config.data);
            expect(body.get('seqVal')).toBe('seq-1');
            expect(body.get('deviceId')).toBe('ABC1');
            return [200, '{"ok":true}'];
        });

        const response = await client.post(
            '/services/echo',
            { seqVal: 'seq-1', deviceId: 'ABC1' },
            { session: { authToken: 'token-abc' } }
        );

        expect(response).toEqual({ status: 200, body: '{"ok":true}' });
    });

    test('post: absolute URL goes to the external host with query params', async () => {
        mock.onPost('https://external.test/status').reply(config => {
            expect(config.params).toEqual({ google_addr: '1 TEST ST' });
            return [200, 'eligible'];
        });

        const response = await client.post(
            'https://external.test/status',
            {},
            { session: {}, params: { google_addr: '1 TEST ST' } }
        );

        expect(response.body).toBe('eligible');
    });

    test('object bodies are returned as JSON text', async () => {
        mock.onPost('/services/json').reply(200, { seqValue: 'seq-9' });

        const response = await client.post('/services/json', {}, { session: {} });

        expect(JSON.parse(response.body)).toEqual({ seqValue: 'seq-9' });
    });

    test('Error Mapping: non-2xx becomes RequestFailure with status and url', async () => {
        mock.onPost('/services/fail').reply(500, 'boom');

        const failure = await client.post('/services/fail', {}, { session: {} }).catch((e: unknown) => e);

        expect(failure).toBeInstanceOf(RequestFailure);
        if (failure instanceof RequestFailure) {
            expect(failure.statusCode).toBe(500);
            expect(failure.url).toBe('https://api.test/services/fail');
            expect(failure.message).toBe(
                'Request to https://api.test/services/fail failed: Request failed with status code 500'
            );
        }
    });

    test('Error Mapping: network error becomes RequestFailure without status', async () => {
        mock.onPost('/services/down').networkError();

        const failure = await client.post('/services/down', {}, { session: {} }).catch((e: unknown) => e);

        expect(failure).toBeInstanceOf(RequestFailure);
        if (failure instanceof RequestFailure) {
            expect(failure.statusCode).toBeUndefined();
            expect(failure.cause).toBeDefined();
        }
    });

    test('Error Mapping: timeout becomes RequestFailure', async () => {
        mock.onPost('/services/slow').timeout();

        await expect(client.post('/services/slow', {}, { session: {} })).rejects.toThrow(RequestFailure);
    });
});
