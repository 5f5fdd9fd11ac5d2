import fs from 'fs';
import { Writable } from 'stream';
import winston from 'winston';

/**
 * Send logs to the console, and to a file once one has been configured.
 * With `stdout: false` every level goes to stderr, which keeps stdout free
 * for a report piped to another tool.
 */

export type LogType = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
    filePath?: string | null;
    stdout?: boolean;
}

interface FileSink {
    logger: winston.Logger;
    transport: Writable;
    stream: fs.WriteStream;
}

const { combine, timestamp, printf } = winston.format;

const fileFormat = combine(
    timestamp(),
    printf(({ level, message, timestamp: ts }) => `${ts} [${level.toUpperCase()}] ${message}`)
);

let fileSink: FileSink | null = null;
let useStdout = true;

function openFileSink(filePath: string): FileSink {
    const stream = fs.createWriteStream(filePath, { flags: 'a', encoding: 'utf-8' });
    const transport = new winston.transports.Stream({ stream, eol: '\n' });
    const sink: FileSink = {
        logger: winston.createLogger({ level: 'debug', format: fileFormat, transports: [transport] }),
        transport,
        stream
    };

    stream.on('error', (error) => {
        console.error(`[ERROR] Could not write to log file ${filePath}: ${error.message}`);
        if (fileSink === sink) {
            fileSink = null;
        }
    });

    return sink;
}

// The transport finishes once the logger has handed it every line; the file
// stream is ended after that and `done` runs when its descriptor is closed.
function closeFileSink(sink: FileSink, done: () => void = () => undefined): void {
    sink.transport.once('finish', () => {
        if (sink.stream.destroyed) {
            done();
            return;
        }
        sink.stream.once('close', done);
        sink.stream.end();
    });
    sink.logger.end();
}

export function configureLogger({ filePath = null, stdout = true }: LoggerOptions = {}): void {
    if (fileSink) {
        closeFileSink(fileSink);
    }
    fileSink = filePath ? openFileSink(filePath) : null;
    useStdout = stdout;
}

/**
 * Flushes and detaches the log file, if one is configured. Console output
 * keeps working afterwards.
 */
export function closeLogger(): Promise<void> {
    const sink = fileSink;
    fileSink = null;
    if (!sink) {
        return Promise.resolve();
    }
    return new Promise((resolve) => closeFileSink(sink, resolve));
}

export function log(str: string, type: LogType = 'info'): void {
    const line = `[${type.toUpperCase()}] ${str}`;

    if (type === 'error') {
        console.error(line);
    }
    else if (type === 'warn') {
        console.warn(line);
    }
    else if (type !== 'debug' || process.env.PROBE_DEBUG) {
        if (useStdout) {
            console.log(line);
        }
        else {
            console.error(line);
        }
    }

    fileSink?.logger.log(type, str);
}
