import crypto from 'crypto';
import { logger } from '../logging/logger.js';

/**
 * Infrastructure failures (pool, repository, sink) surface as HubgateError:
 * a generic public message plus an incident id. The raw cause is logged once,
 * under that id, and never leaves the process in the message.
 */

export type ErrorCategory = 'SEC' | 'OPS';

export interface HubgateErrorOptions {
    cause?: unknown;
    contextLabel?: string;
    sqlState?: string;
}

export class HubgateError extends Error {
    public readonly incidentId: string;
    public readonly timestamp: string;
    public readonly contextLabel?: string;
    public readonly sqlState?: string;
    public override cause?: unknown;

    constructor(
        public readonly publicMessage: string,
        public readonly internalDetails?: unknown,
        public readonly category: ErrorCategory = 'OPS',
        options: HubgateErrorOptions = {}
    ) {
        super(publicMessage);
        this.name = 'HubgateError';
        this.incidentId = crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        this.contextLabel = options.contextLabel;
        this.sqlState = options.sqlState;
        this.cause = options.cause;

        logger.error({
            incidentId: this.incidentId,
            category: this.category,
            contextLabel: this.contextLabel,
            sqlState: this.sqlState,
            internalDetails
        }, publicMessage);
    }
}

interface ThrownDescription {
    message: string;
    stack?: string;
    sqlState?: string;
}

function readStringField(value: object, field: string): string | undefined {
    const candidate: unknown = Reflect.get(value, field);
    return typeof candidate === 'string' ? candidate : undefined;
}

function describeThrown(err: unknown): ThrownDescription {
    if (typeof err === 'string') {
        return { message: err };
    }
    if (err !== null && typeof err === 'object') {
        return {
            message: readStringField(err, 'message') ?? Object.prototype.toString.call(err),
            stack: readStringField(err, 'stack'),
            // node-postgres puts the SQLSTATE on `code`
            sqlState: readStringField(err, 'code')
        };
    }
    return { message: String(err) };
}

export const ErrorSanitizer = {
    /**
     * Wrap anything thrown below the authority into a HubgateError.
     * An existing HubgateError passes through untouched.
     */
    sanitize: (err: unknown, contextLabel: string): HubgateError => {
        if (err instanceof HubgateError) return err;

        const thrown = describeThrown(err);
        return new HubgateError(
            'An internal error occurred while processing the request.',
            { originalError: thrown.message, stack: thrown.stack, context: contextLabel },
            'OPS',
            { cause: err, contextLabel, sqlState: thrown.sqlState }
        );
    },

    /** Incident reference safe to show a caller. */
    publicReference: (error: HubgateError): string =>
        `${error.publicMessage} Incident: ${error.incidentId}`
};
