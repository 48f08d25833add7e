/**
 * Races `work` against a hard deadline. Libraries have their own timeouts,
 * but a proxy that accepts the socket and then stalls can slip past them.
 */
export class HardTimeoutError extends Error {
    constructor(readonly timeoutMs: number) {
        super(`Hard timeout after ${timeoutMs}ms`);
        this.name = 'HardTimeoutError';
    }
}

export async function withHardTimeout<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new HardTimeoutError(timeoutMs)), timeoutMs);
    });
    try {
        return await Promise.race([work, deadline]);
    } finally {
        clearTimeout(timer);
    }
}
