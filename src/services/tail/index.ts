import { access, open } from 'fs/promises';
import { StringDecoder } from 'string_decoder';
import { setTimeout as sleep } from 'timers/promises';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('Tail');

const CHUNK_SIZE = 64 * 1024;
const REPLACEMENT_CHAR = /\uFFFD/g;

export interface TailOptions {
    /** Delay before re-reading when no new data arrived (ms) */
    pollIntervalMs: number;
    /** Delay between existence checks while the file is missing (ms) */
    waitForFileMs: number;
    /** Read a regular file from its first byte instead of its current end */
    fromStart?: boolean;
    /** Ends the tail */
    signal?: AbortSignal;
}

/**
 * Sleep unless aborted. Resolves to false once the signal has fired.
 */
async function pause(ms: number, signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) return false;
    try {
        await sleep(ms, undefined, { signal });
        return true;
    } catch (error) {
        if (signal?.aborted) return false;
        throw error;
    }
}

async function exists(path: string): Promise<boolean> {
    try {
        await access(path);
        return true;
    } catch {
        return false;
    }
}

/**
 * Poll until the path exists. Resolves to false if aborted first.
 */
async function waitForFile(path: string, waitForFileMs: number, signal?: AbortSignal): Promise<boolean> {
    let announced = false;
    while (!(await exists(path))) {
        if (!announced) {
            logger.info(`Waiting for ${path} to appear`);
            announced = true;
        }
        if (!(await pause(waitForFileMs, signal))) return false;
    }
    return true;
}

interface Cursor {
    /** Byte offset to read from next; null until a regular file was opened */
    position: number | null;
    /** Last read failure, cleared once data flows again */
    failure: string | null;
}

/**
 * Open the file once and yield its lines until aborted.
 * Open and read errors propagate to the caller.
 */
async function* follow(path: string, cursor: Cursor, options: TailOptions): AsyncGenerator<string> {
    const { pollIntervalMs, signal } = options;
    const handle = await open(path, 'r');

    try {
        const stats = await handle.stat();
        let position: number | null = null;

        if (stats.isFile()) {
            if (cursor.position === null) {
                position = stats.size;
            } else if (cursor.position > stats.size) {
                logger.info(`${path} shrank; reading from the start`);
                position = 0;
            } else {
                position = cursor.position;
            }
            cursor.position = position;
        } else if (cursor.failure === null) {
            logger.info(`${path} is not seekable; reading from the current position`);
        }

        const decoder = new StringDecoder('utf8');
        const buffer = Buffer.alloc(CHUNK_SIZE);
        let pending = '';

        while (!signal?.aborted) {
            const { bytesRead } = await handle.read(buffer, 0, buffer.length, position);
            cursor.failure = null;

            if (bytesRead === 0) {
                if (!(await pause(pollIntervalMs, signal))) return;
                continue;
            }

            if (position !== null) {
                position += bytesRead;
                cursor.position = position;
            }
            pending += decoder.write(buffer.subarray(0, bytesRead)).replace(REPLACEMENT_CHAR, '');

            let newline = pending.indexOf('\n');
            while (newline !== -1) {
                const line = pending.slice(0, newline);
                pending = pending.slice(newline + 1);
                yield line.endsWith('\r') ? line.slice(0, -1) : line;

                if (signal?.aborted) return;
                newline = pending.indexOf('\n');
            }
        }
    } finally {
        await handle.close();
    }
}

/**
 * Follow a growing text file, yielding one line at a time (like `tail -F`
 * without rotation handling).
 *
 * - Waits for the file to appear
 * - Starts at the end of a regular file, or at the current position of a
 *   non-seekable one (FIFO, character device)
 * - Holds back an unterminated last line until its newline arrives
 * - Drops bytes that are not valid UTF-8
 * - On an open or read error, logs it, closes the file and waits for it
 *   again. A reopened file is read from the last offset reached, or from
 *   its start if it was never opened
 */
export async function* tailFile(path: string, options: TailOptions): AsyncGenerator<string> {
    const { waitForFileMs, signal } = options;
    const cursor: Cursor = { position: options.fromStart ? 0 : null, failure: null };

    while (!signal?.aborted) {
        if (!(await waitForFile(path, waitForFileMs, signal))) return;

        try {
            yield* follow(path, cursor, options);
            return;
        } catch (error) {
            if (signal?.aborted) return;

            const message = error instanceof Error ? error.message : String(error);
            if (message === cursor.failure) {
                logger.debug(`Still cannot read ${path}: ${message}`);
            } else {
                logger.warn(`Cannot read ${path}: ${message}. Retrying every ${waitForFileMs}ms`);
                cursor.failure = message;
            }
            if (cursor.position === null) {
                cursor.position = 0;
            }
        }

        if (!(await pause(waitForFileMs, signal))) return;
    }
}
