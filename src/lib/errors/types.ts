// Structured error handling with recovery hints

export enum ErrorCode {
    // Configuration errors (fatal to a pass)
    CONFIG_SETTINGS_INVALID = 'CONFIG_001',
    CONFIG_PATTERNS_INVALID = 'CONFIG_002',
    CONFIG_LIST_UNREADABLE = 'CONFIG_003',
    CONFIG_LIST_EMPTY = 'CONFIG_004',
    CONFIG_ATTRIBUTES_INVALID = 'CONFIG_005',

    // Drawing errors
    DXF_PARSE_FAILED = 'DXF_001',
    DXF_EMPTY_FILE = 'DXF_002',
    DRAWING_MUTATION_REJECTED = 'DRAWING_001',
    DRAWING_STATE_INVALID = 'DRAWING_002',

    // Export errors
    EXPORT_NO_JOB = 'EXPORT_001',
    EXPORT_REJECTED = 'EXPORT_002',
    NETWORK_ERROR = 'NETWORK_001',
    TIMEOUT_ERROR = 'TIMEOUT_001',

    UNKNOWN_ERROR = 'UNKNOWN_001',
}

export type ErrorContext = Record<string, unknown>;

export interface AppError {
    code: ErrorCode;
    message: string;
    context: ErrorContext;
    recoverable: boolean;
    suggestedAction?: string;
    originalError?: Error;
    timestamp: string;
}

export interface RecoveryResult<T> {
    success: boolean;
    data?: T;
    error?: AppError;
    strategy: string;
}

/**
 * Create a structured application error with context and recovery information
 * @example
 * ```ts
 * const error = createAppError(
 *   ErrorCode.CONFIG_PATTERNS_INVALID,
 *   'Pattern library could not be parsed',
 *   { path: 'config/patterns.json' }
 * );
 * ```
 */
export function createAppError(
    code: ErrorCode,
    message: string,
    context: ErrorContext = {},
    originalError?: Error
): AppError {
    const errorConfig = getErrorConfig(code);

    return {
        code,
        message,
        context,
        recoverable: errorConfig.recoverable,
        suggestedAction: errorConfig.suggestedAction,
        originalError,
        timestamp: new Date().toISOString(),
    };
}

/**
 * Throwable wrapper around AppError, for code paths that abort.
 */
export class MatcherError extends Error {
    readonly appError: AppError;

    constructor(appError: AppError) {
        super(appError.message);
        this.name = 'MatcherError';
        this.appError = appError;
    }

    get code(): ErrorCode {
        return this.appError.code;
    }
}

export function failWith(
    code: ErrorCode,
    message: string,
    context: ErrorContext = {},
    originalError?: unknown
): MatcherError {
    return new MatcherError(createAppError(code, message, context, toError(originalError)));
}

export function toError(value: unknown): Error | undefined {
    if (value === undefined) return undefined;
    return value instanceof Error ? value : new Error(String(value));
}

export function isMatcherError(value: unknown, code?: ErrorCode): value is MatcherError {
    return value instanceof MatcherError && (code === undefined || value.code === code);
}

function getErrorConfig(code: ErrorCode): {
    recoverable: boolean;
    suggestedAction?: string;
} {
    const configs: Record<ErrorCode, { recoverable: boolean; suggestedAction?: string }> = {
        [ErrorCode.CONFIG_SETTINGS_INVALID]: {
            recoverable: false,
            suggestedAction: 'Check the environment variables against .env.example',
        },
        [ErrorCode.CONFIG_PATTERNS_INVALID]: {
            recoverable: false,
            suggestedAction: 'Fix the pattern library JSON file and run the pass again',
        },
        [ErrorCode.CONFIG_LIST_UNREADABLE]: {
            recoverable: false,
            suggestedAction: 'Check the path and format (.xlsx or .csv) of the list file',
        },
        [ErrorCode.CONFIG_LIST_EMPTY]: {
            recoverable: false,
            suggestedAction: 'The list file has no values in its first column',
        },
        [ErrorCode.CONFIG_ATTRIBUTES_INVALID]: {
            recoverable: false,
            suggestedAction: 'Fix the attribute catalog JSON file',
        },

        [ErrorCode.DXF_PARSE_FAILED]: {
            recoverable: false,
            suggestedAction: 'Check that the DXF file is valid and not truncated',
        },
        [ErrorCode.DXF_EMPTY_FILE]: {
            recoverable: false,
            suggestedAction: 'The DXF file has no entities',
        },
        [ErrorCode.DRAWING_MUTATION_REJECTED]: {
            recoverable: false,
            suggestedAction: 'The drawing changed during the pass. Run the pass again on a fresh snapshot',
        },
        [ErrorCode.DRAWING_STATE_INVALID]: {
            recoverable: false,
            suggestedAction: 'Fix or delete the .drawing.json file written by the previous pass',
        },

        [ErrorCode.EXPORT_NO_JOB]: {
            recoverable: false,
            suggestedAction: 'No job is in process on the export service',
        },
        [ErrorCode.EXPORT_REJECTED]: {
            recoverable: false,
            suggestedAction: 'The export service rejected the batch. See the response body',
        },
        [ErrorCode.NETWORK_ERROR]: {
            recoverable: true,
            suggestedAction: 'Network error. Retrying...',
        },
        [ErrorCode.TIMEOUT_ERROR]: {
            recoverable: true,
            suggestedAction: 'The export service took too long. Retrying...',
        },

        [ErrorCode.UNKNOWN_ERROR]: {
            recoverable: false,
            suggestedAction: 'Unknown error. Check the logs',
        },
    };

    return configs[code] || { recoverable: false };
}

/**
 * Calculate exponential backoff delay for retry attempts
 * @param attempt - Current attempt number (0-indexed)
 * @param baseDelay - Base delay in milliseconds
 * @returns Delay in milliseconds, capped at 30 seconds
 * @example
 * ```ts
 * exponentialBackoff(0) // 1000ms
 * exponentialBackoff(2) // 4000ms
 * exponentialBackoff(5) // 30000ms (capped)
 * ```
 */
export function exponentialBackoff(attempt: number, baseDelay: number = 1000): number {
    return Math.min(baseDelay * Math.pow(2, attempt), 30000);
}

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
