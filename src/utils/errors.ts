/**
 * Pipeline error taxonomy.
 *
 * Stage-internal transient failures are retried where they happen (see the
 * HTTP client); everything here propagates to the driver and ends the run.
 */
export type EtlErrorCode =
    | 'VALIDATION'
    | 'FETCH_EXHAUSTED'
    | 'MISSING_PREREQUISITE'
    | 'MALFORMED_RECORD'
    | 'STAGE_OUTPUT';

export class EtlError extends Error {
    constructor(
        message: string,
        public readonly code: EtlErrorCode,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'EtlError';
    }
}

/**
 * Bad CLI or config input. Raised before any I/O.
 */
export class ValidationError extends EtlError {
    constructor(
        message: string,
        public readonly issues: string[] = []
    ) {
        super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, 'VALIDATION');
        this.name = 'ValidationError';
    }
}

/**
 * A request kept failing after every retry.
 */
export class FetchExhaustedError extends EtlError {
    constructor(
        public readonly url: string,
        public readonly attempts: number,
        cause: unknown
    ) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super(`Request failed after ${attempts} attempts: ${url} (${reason})`, 'FETCH_EXHAUSTED', { cause });
        this.name = 'FetchExhaustedError';
    }
}

/**
 * A table a stage depends on has not been produced yet.
 */
export class MissingPrerequisiteError extends EtlError {
    constructor(
        public readonly requiredBy: string,
        public readonly missing: string[]
    ) {
        super(`${requiredBy} requires missing tables: ${missing.join(', ')}`, 'MISSING_PREREQUISITE');
        this.name = 'MissingPrerequisiteError';
    }
}

/**
 * A raw record that does not project onto the table schema.
 */
export class MalformedRecordError extends EtlError {
    constructor(
        public readonly file: string,
        public readonly line: number,
        reason: string
    ) {
        super(`Malformed record at ${file}:${line}: ${reason}`, 'MALFORMED_RECORD');
        this.name = 'MalformedRecordError';
    }
}

/**
 * A stage finished without producing the outputs it declares.
 */
export class StageOutputError extends EtlError {
    constructor(
        public readonly stage: string,
        public readonly missing: string[]
    ) {
        super(`Stage "${stage}" did not produce: ${missing.join(', ')}`, 'STAGE_OUTPUT');
        this.name = 'StageOutputError';
    }
}
