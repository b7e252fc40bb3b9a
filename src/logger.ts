import * as path from 'path';
import pino, { Logger } from 'pino';
import { createStream } from 'rotating-file-stream';

export interface FileLoggerOptions {
    file: string;
    level: string;
}

export interface FileLogger {
    logger: Logger;
    /**
     * Resolves once every buffered line is on disk and the file is closed.
     */
    close(): Promise<void>;
}

/**
 * Append-only log with size-based rotation (5 MB, two rotated files kept).
 */
export function createFileLogger(options: FileLoggerOptions): FileLogger {
    const stream = createStream(path.basename(options.file), {
        path: path.dirname(path.resolve(options.file)),
        size: '5M',
        maxFiles: 2,
    });

    const logger = pino(
        {
            level: options.level,
            base: { system: 'radio-activator' },
            timestamp: pino.stdTimeFunctions.isoTime,
        },
        stream
    );

    return {
        logger,
        close: () => new Promise<void>((resolve, reject) => {
            stream.once('error', reject);
            stream.end(() => resolve());
        }),
    };
}

export function createSilentLogger(): Logger {
    return pino({ level: 'silent' });
}
