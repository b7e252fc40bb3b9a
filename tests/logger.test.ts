import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createFileLogger } from '../src/logger';

describe('createFileLogger', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'file-logger-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    test('close flushes the last line written before exit', async () => {
        const file = path.join(dir, 'activation.log');
        const { logger, close } = createFileLogger({ file, level: 'info' });

        logger.debug('below the level');
        logger.info({ radioId: 'ABC1' }, 'Run ended by operator');
        await close();

        const lines = fs.readFileSync(file, 'utf8').trim().split('\n').map(line => JSON.parse(line));
        expect(lines).toHaveLength(1);
        expect(lines[0]).toMatchObject({
            level: 30,
            system: 'radio-activator',
            radioId: 'ABC1',
            msg: 'Run ended by operator',
        });
    });
});
