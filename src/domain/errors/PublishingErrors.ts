/**
 * Failure types of the publishing core.
 *
 * PublishError comes from the LinkedIn side, StoreError from the post store.
 * Neither is retried where it is raised; the scheduler decides what happens next.
 */

export class PublishError extends Error {
    /** HTTP status from the provider, undefined for network-level failures */
    readonly status?: number;
    readonly providerMessage: string;
    /** Network errors, 429 and 5xx */
    readonly transient: boolean;

    constructor(providerMessage: string, status?: number) {
        super(`LinkedIn publish failed (${status ?? 'network'}): ${providerMessage}`);
        this.name = 'PublishError';
        this.status = status;
        this.providerMessage = providerMessage;
        this.transient = isTransientStatus(status);
    }
}

export type StoreOperation = 'append' | 'scan' | 'markPosted' | 'ensureLayout';

export class StoreError extends Error {
    readonly operation: StoreOperation;
    readonly original?: unknown;

    constructor(operation: StoreOperation, message: string, original?: unknown) {
        super(`Post store ${operation} failed: ${message}`);
        this.name = 'StoreError';
        this.operation = operation;
        this.original = original;
    }
}

/**
 * Rate limits, server errors and missing responses are worth another try.
 */
export function isTransientStatus(status?: number): boolean {
    if (status === undefined) {
        return true;
    }
    return status === 429 || (status >= 500 && status < 600);
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
