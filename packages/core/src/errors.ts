/**
 * Error taxonomy of the processing core.
 *
 * - format: input text or a field does not have the expected shape
 * - precondition: a stage received an empty table
 * - consistency: a stage produced output that contradicts its own contract
 */

export type ErrorKind = 'format' | 'precondition' | 'consistency';

export class GlDeductionsError extends Error {
    readonly kind: ErrorKind;

    constructor(kind: ErrorKind, message: string) {
        super(message);
        this.name = new.target.name;
        this.kind = kind;
    }
}

/**
 * Raised when an export data line cannot be split into the expected fields.
 */
export class ExportFormatError extends GlDeductionsError {
    readonly line: number;

    constructor(line: number, message: string) {
        super('format', `Export line ${line}: ${message}`);
        this.line = line;
    }
}

/**
 * Raised when a field value of an export data line fails type conversion.
 */
export class ExportDecodeError extends GlDeductionsError {
    readonly line: number;
    readonly field: string;
    readonly value: string;

    constructor(line: number, field: string, value: string, reason: string) {
        super('format', `Export line ${line}: cannot decode ${field} "${value}" (${reason})`);
        this.line = line;
        this.field = field;
        this.value = value;
    }
}

/**
 * Raised when a customer master file is missing columns or holds unreadable keys.
 */
export class MasterFormatError extends GlDeductionsError {
    constructor(source: string, message: string) {
        super('format', `${source}: ${message}`);
    }
}

export class EmptyInputError extends GlDeductionsError {
    constructor(message: string) {
        super('precondition', message);
    }
}

export class ConsistencyError extends GlDeductionsError {
    constructor(message: string) {
        super('consistency', message);
    }
}
