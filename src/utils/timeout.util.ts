/**
 * Reject with a timeout error when `promise` has not settled after `ms`.
 * The pending timer never keeps the process alive.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, operationName: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error(`${operationName} timeout after ${ms}ms`)), ms);
        timer.unref();
    });
    return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}
