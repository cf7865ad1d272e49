/**
 * Error context for correlation and tracing
 */
export interface ErrorContext {
    /** Unique correlation ID for run tracing */
    correlationId?: string;
    /** Timestamp when error occurred */
    timestamp?: Date;
    /** Original cause of the error */
    cause?: Error;
    /** Operation that was being performed */
    operation?: string;
}

/**
 * Generate a unique correlation ID
 */
export function generateCorrelationId(): string {
    return `pdfc_${Date.now()}_${Math.random().toString(36).substring(2, 11)}`;
}

/**
 * Base error class for pdf-censor
 * All errors extend this class for consistent handling
 */
export class PdfCensorError extends Error {
    public readonly code: string;
    public readonly details?: Record<string, unknown>;
    public readonly correlationId: string;
    public readonly timestamp: Date;
    public readonly cause?: Error;
    public readonly operation?: string;

    constructor(
        message: string,
        code: string,
        details?: Record<string, unknown>,
        context?: ErrorContext
    ) {
        super(message);
        this.name = 'PdfCensorError';
        this.code = code;
        this.details = details;
        this.correlationId = context?.correlationId ?? generateCorrelationId();
        this.timestamp = context?.timestamp ?? new Date();
        this.cause = context?.cause;
        this.operation = context?.operation;
        Error.captureStackTrace(this, this.constructor);
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            details: this.details,
            correlationId: this.correlationId,
            timestamp: this.timestamp.toISOString(),
            operation: this.operation,
            cause: this.cause ? {
                name: this.cause.name,
                message: this.cause.message,
            } : undefined,
        };
    }
}

/**
 * Wrap an unknown error into a PdfCensorError
 */
export function wrapError(
    error: unknown,
    ErrorClass: new (message: string, details?: Record<string, unknown>) => PdfCensorError,
    operation?: string
): PdfCensorError {
    if (error instanceof PdfCensorError) {
        return error;
    }

    const originalError = error instanceof Error ? error : new Error(String(error));
    const wrapped = new ErrorClass(originalError.message, {
        originalError: originalError.name,
    });

    // Copy over correlation context
    Object.defineProperty(wrapped, 'cause', { value: originalError });
    Object.defineProperty(wrapped, 'operation', { value: operation });

    return wrapped;
}

/**
 * Configuration-related errors
 */
export class ConfigurationError extends PdfCensorError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, 'CONFIGURATION_ERROR', details);
        this.name = 'ConfigurationError';
    }
}

/**
 * Validation errors
 */
export class ValidationError extends PdfCensorError {
    public readonly field?: string;

    constructor(message: string, field?: string, details?: Record<string, unknown>) {
        super(message, 'VALIDATION_ERROR', { field, ...details });
        this.name = 'ValidationError';
        this.field = field;
    }
}

/**
 * A redaction rectangle with non-positive or non-finite geometry.
 * Raised before any page content is touched.
 */
export class InvalidRegionError extends PdfCensorError {
    public readonly regionIndex: number;

    constructor(message: string, regionIndex: number, details?: Record<string, unknown>) {
        super(message, 'INVALID_REGION', { regionIndex, ...details });
        this.name = 'InvalidRegionError';
        this.regionIndex = regionIndex;
    }
}

/**
 * The document could not be opened or parsed at all
 */
export class DocumentLoadError extends PdfCensorError {
    public readonly filename?: string;

    constructor(message: string, filename?: string, details?: Record<string, unknown>) {
        super(message, 'DOCUMENT_LOAD_ERROR', { filename, ...details });
        this.name = 'DocumentLoadError';
        this.filename = filename;
    }
}

/**
 * A page content stream that cannot be decoded or tokenized
 */
export class ContentStreamError extends PdfCensorError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, 'CONTENT_STREAM_ERROR', details);
        this.name = 'ContentStreamError';
    }
}

/**
 * No annotation anchor is free of redaction regions
 */
export class FieldPlacementError extends PdfCensorError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, 'FIELD_PLACEMENT_ERROR', details);
        this.name = 'FieldPlacementError';
    }
}

/**
 * Writing a censored document or copying a failed one did not succeed
 */
export class OutputWriteError extends PdfCensorError {
    public readonly path: string;

    constructor(message: string, path: string, details?: Record<string, unknown>) {
        super(message, 'OUTPUT_WRITE_ERROR', { path, ...details });
        this.name = 'OutputWriteError';
        this.path = path;
    }
}

/**
 * Not found errors
 */
export class NotFoundError extends PdfCensorError {
    public readonly resourceType: string;
    public readonly resourceId: string;

    constructor(resourceType: string, resourceId: string) {
        super(`${resourceType} not found: ${resourceId}`, 'NOT_FOUND', {
            resourceType,
            resourceId,
        });
        this.name = 'NotFoundError';
        this.resourceType = resourceType;
        this.resourceId = resourceId;
    }
}
