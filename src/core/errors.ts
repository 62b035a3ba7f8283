/**
 * Core error hierarchy for the API test agent.
 *
 * All errors extend AppError and carry a machine-readable code
 * plus optional structured context for debugging. Completion and
 * process failures are returned inside a Result rather than thrown;
 * see core/result.ts.
 *
 * Dependency direction: errors.ts → nothing (leaf module)
 * Used by: every layer in the application
 */

/** Base application error with structured metadata. */
export class AppError extends Error {
    public readonly code: string;
    public readonly context?: Record<string, unknown>;

    constructor(message: string, code: string, context?: Record<string, unknown>) {
        super(message);
        this.name = 'AppError';
        this.code = code;
        this.context = context;

        // Maintains proper stack trace in V8
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }
}

/** Raised when configuration is missing, invalid, or cannot be loaded/saved. */
export class ConfigError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'CONFIG_ERROR', context);
        this.name = 'ConfigError';
    }
}

/** No API key was configured for the completion service. */
export class MissingCredentialError extends AppError {
    public readonly kind = 'missing_credential' as const;

    constructor(variable: string) {
        super(
            `The environment variable ${variable} is not set.\n` +
                `Please export ${variable}=<your_key> and try again.`,
            'MISSING_CREDENTIAL',
            { variable },
        );
        this.name = 'MissingCredentialError';
    }
}

/** The completion request never got a response (DNS, refused, timeout). */
export class TransportError extends AppError {
    public readonly kind = 'transport' as const;

    constructor(message: string, cause: unknown, context?: Record<string, unknown>) {
        super(message, 'TRANSPORT_ERROR', {
            ...context,
            cause: cause instanceof Error ? cause.message : String(cause),
        });
        this.name = 'TransportError';
        this.cause = cause;
    }
}

/** The completion service answered with a non-200 status. */
export class UpstreamError extends AppError {
    public readonly kind = 'upstream' as const;
    public readonly status: number;
    public readonly body: string;

    constructor(status: number, body: string) {
        super(`Completion service responded with status ${status}:\n${body}`, 'UPSTREAM_ERROR', {
            status,
        });
        this.name = 'UpstreamError';
        this.status = status;
        this.body = body;
    }
}

/** A 200 response whose body carries no usable completion text. */
export class MalformedResponseError extends AppError {
    public readonly kind = 'malformed_response' as const;

    constructor(reason: string, bodyPreview: string) {
        super(`${reason}. Response content:\n${bodyPreview}`, 'MALFORMED_RESPONSE', { reason });
        this.name = 'MalformedResponseError';
    }
}

/** The generated test file could not be written. */
export class WriteError extends AppError {
    public readonly kind = 'write' as const;

    constructor(filePath: string, cause: unknown) {
        super(
            `Could not write to ${filePath}: ${cause instanceof Error ? cause.message : String(cause)}`,
            'WRITE_ERROR',
            { filePath },
        );
        this.name = 'WriteError';
    }
}

/** The test runner process could not be started at all. */
export class ProcessSpawnError extends AppError {
    public readonly kind = 'process_spawn' as const;

    constructor(command: string, reason: string) {
        super(`Test runner "${command}" failed to start: ${reason}`, 'PROCESS_SPAWN_ERROR', {
            command,
        });
        this.name = 'ProcessSpawnError';
    }
}

/** Failures a completion call can end in. */
export type CompletionError =
    | MissingCredentialError
    | TransportError
    | UpstreamError
    | MalformedResponseError;

/** Render any application error as the diagnostic line printed to the user. */
export function formatDiagnostic(err: AppError): string {
    return `ERROR: ${err.message}`;
}
