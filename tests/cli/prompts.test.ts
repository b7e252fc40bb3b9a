import { PassThrough } from 'stream';
import { ask, closePrompts, setInterruptHandler, setPromptStreams } from '../../src/cli/prompts';

describe('prompts', () => {
    let input: PassThrough;

    beforeEach(() => {
        input = new PassThrough();
        setPromptStreams(input, new PassThrough());
    });

    afterEach(() => {
        closePrompts();
    });

    test('ask resolves with the trimmed answer', async () => {
        setInterruptHandler(jest.fn());
        const answer = ask('Radio ID: ');
        input.write('  abc1  \n');

        await expect(answer).resolves.toBe('abc1');
    });

    test('end of input runs the interrupt handler once', async () => {
        const handler = jest.fn();
        const interrupted = new Promise<void>((resolve) => {
            setInterruptHandler(() => {
                handler();
                resolve();
            });
        });

        void ask('Radio ID: ');
        input.end();
        await interrupted;

        expect(handler).toHaveBeenCalledTimes(1);
    });

    test('closePrompts does not run the interrupt handler', async () => {
        const handler = jest.fn();
        setInterruptHandler(handler);
        const answer = ask('Continue? ');
        input.write('y\n');
        await answer;

        closePrompts();
        await new Promise((resolve) => setImmediate(resolve));

        expect(handler).not.toHaveBeenCalled();
    });
});
