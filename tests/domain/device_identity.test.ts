import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DeviceIdentity } from '../../src/domain/device_identity';
import { InMemoryConfigurationStore } from '../../src/infrastructure/in_memory_repository';
import { ConfigurationStore } from '../../src/infrastructure/configuration_store';
import { createSilentLogger } from '../../src/logger';

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('DeviceIdentity', () => {
    const logger = createSilentLogger();

    test('generates a uuid v4 once and persists it', () => {
        const store = new InMemoryConfigurationStore();
        const identity = new DeviceIdentity(store, logger);

        const first = identity.getOrCreate();
        expect(first.created).toBe(true);
        expect(first.deviceId).toMatch(UUID_V4);
        expect(store.getDeviceId()).toBe(first.deviceId);
        expect(store.saveCount).toBe(1);

        const second = identity.getOrCreate();
        expect(second).toEqual({ deviceId: first.deviceId, created: false });
        expect(store.saveCount).toBe(1);
    });

    test('never calls the generator when an id is present', () => {
        const store = new InMemoryConfigurationStore();
        store.setDeviceId('device-existing');
        const generate = jest.fn(() => 'device-new');

        const result = new DeviceIdentity(store, logger, generate).getOrCreate();

        expect(result.deviceId).toBe('device-existing');
        expect(generate).not.toHaveBeenCalled();
    });

    describe('with a file-backed store', () => {
        let dir: string;

        beforeEach(() => {
            dir = fs.mkdtempSync(path.join(os.tmpdir(), 'device-identity-'));
        });

        afterEach(() => {
            fs.rmSync(dir, { recursive: true, force: true });
        });

        test('device_id in the file does not change on the second call', () => {
            const file = path.join(dir, 'config.json');
            const store = new ConfigurationStore(file, logger);
            store.load();
            const identity = new DeviceIdentity(store, logger);

            const first = identity.getOrCreate();
            const afterFirst = JSON.parse(fs.readFileSync(file, 'utf8'));
            const second = identity.getOrCreate();
            const afterSecond = JSON.parse(fs.readFileSync(file, 'utf8'));

            expect(second.deviceId).toBe(first.deviceId);
            expect(afterFirst.device_id).toBe(first.deviceId);
            expect(afterSecond.device_id).toBe(first.deviceId);
        });

        test('a bad record in the file does not cause a new id to be generated', () => {
            const file = path.join(dir, 'config.json');
            fs.writeFileSync(file, JSON.stringify({
                configurations: [
                    { RadioID: 'ABC1', Make: 'Ford', Model: 'F150', Year: '2020' },
                    { RadioID: 'XYZ9', Make: 'Kia', Model: 'Soul', Year: 2018 },
                ],
                device_id: 'device-original',
            }));
            const store = new ConfigurationStore(file, logger);
            store.load();
            const generate = jest.fn(() => 'device-new');

            const result = new DeviceIdentity(store, logger, generate).getOrCreate();

            expect(result).toEqual({ deviceId: 'device-original', created: false });
            expect(generate).not.toHaveBeenCalled();
            const onDisk = JSON.parse(fs.readFileSync(file, 'utf8'));
            expect(onDisk.device_id).toBe('device-original');
            expect(onDisk.configurations).toHaveLength(2);
        });

        test('a new process reuses the persisted id', () => {
            const file = path.join(dir, 'config.json');
            const firstRun = new ConfigurationStore(file, logger);
            firstRun.load();
            const { deviceId } = new DeviceIdentity(firstRun, logger).getOrCreate();

            const secondRun = new ConfigurationStore(file, logger);
            secondRun.load();
            const generate = jest.fn(() => 'should-not-be-used');
            const result = new DeviceIdentity(secondRun, logger, generate).getOrCreate();

            expect(result).toEqual({ deviceId, created: false });
            expect(generate).not.toHaveBeenCalled();
        });
    });
});
