export class TimeoutError extends Error {
    constructor(public readonly label: string, public readonly timeoutMs: number) {
        super(`${label} timed out after ${timeoutMs}ms`);
        this.name = 'TimeoutError';
    }
}

/**
 * Races an operation against a timer. The timer never keeps the process alive.
 */
export function withTimeout<T>(operation: Promise<T>, timeoutMs: number, label: string): Promise<T> {
    return new Promise<T>((resolve, reject) => {
        const timeout = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
        timeout.unref();
        operation.then(result => {
            clearTimeout(timeout);
            resolve(result);
        }).catch((error: unknown) => {
            clearTimeout(timeout);
            reject(error);
        });
    });
}
