import { TimeoutError } from '../models/errors';

/**
 * Run `operation` with an abort signal and reject with a TimeoutError once
 * `timeoutMs` elapses. The signal is aborted on expiry so SDK calls that accept
 * it stop early; calls that ignore it are simply abandoned.
 */
export async function withTimeout<T>(
    label: string,
    timeoutMs: number,
    operation: (signal: AbortSignal) => Promise<T>
): Promise<T> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const expiry = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            controller.abort();
            reject(new TimeoutError(label, timeoutMs));
        }, timeoutMs);
    });

    try {
        return await Promise.race([operation(controller.signal), expiry]);
    } finally {
        if (timer) {
            clearTimeout(timer);
        }
    }
}
