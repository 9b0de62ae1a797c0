/**
 * Core error hierarchy for dreamtools.
 *
 * All errors extend AppError and carry a machine-readable code
 * plus optional structured context for debugging.
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

/** Raised when a file, directory, or service lookup has nothing to return. */
export class NotFoundError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'NOT_FOUND', context);
        this.name = 'NotFoundError';
    }
}

/** Raised when JSON or YAML text is malformed. */
export class ParseError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'PARSE_ERROR', context);
        this.name = 'ParseError';
    }
}

/** Raised when a parsed document does not have the expected structure. */
export class SchemaError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'SCHEMA_ERROR', context);
        this.name = 'SchemaError';
    }
}

/** Raised when a write would clobber an existing file or directory. */
export class AlreadyExistsError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'ALREADY_EXISTS', context);
        this.name = 'AlreadyExistsError';
    }
}

/** Raised when a caller passes a missing or contradictory argument combination. */
export class InvalidArgumentError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'INVALID_ARGUMENT', context);
        this.name = 'InvalidArgumentError';
    }
}

/** Raised when a path expected to be a directory is missing or is a file. */
export class NotADirectoryError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'NOT_A_DIRECTORY', context);
        this.name = 'NotADirectoryError';
    }
}

/** Raised when the dreamtools settings file is invalid or cannot be saved. */
export class ConfigError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'CONFIG_ERROR', context);
        this.name = 'ConfigError';
    }
}
