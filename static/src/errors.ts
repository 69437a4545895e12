/**
 * Status codes reported by decode operations.
 */
export enum ConvertStatus {
    Success,
    AllocationError,
    ParseError,
    InvalidParam,
}

export type FailureStatus = Exclude<ConvertStatus, ConvertStatus.Success>;

/**
 * Error raised while converting a value tree into an instance. `path` is the
 * dotted location of the failing field, e.g. `head.next.value` or
 * `points[2].x`; it is empty for the top-level value.
 */
export class ConvertError extends Error {
    readonly status: FailureStatus;
    readonly path: string;

    constructor(status: FailureStatus, message: string, path: string = "") {
        super(path ? `${path}: ${message}` : message);
        this.name = "ConvertError";
        this.status = status;
        this.path = path;
    }
}

/**
 * Outcome of a decode. Failures never carry a value, so a partially
 * populated instance is never reported as success.
 */
export type ConvertResult<T> =
    | { readonly status: ConvertStatus.Success; readonly value: T }
    | { readonly status: FailureStatus; readonly error: ConvertError };

export function success<T>(value: T): ConvertResult<T> {
    return { status: ConvertStatus.Success, value };
}

export function failure<T>(error: ConvertError): ConvertResult<T> {
    return { status: error.status, error };
}

/**
 * Error thrown when converter configuration is invalid, for example when an
 * enabled type depends on a disabled one.
 */
export class ConfigError extends Error {
    readonly issues: string[];

    constructor(message: string, issues: string[] = []) {
        super(issues.length > 0 ? `${message}:\n  ${issues.join("\n  ")}` : message);
        this.name = "ConfigError";
        this.issues = issues;
    }
}

/**
 * Error thrown when a type schema document cannot be turned into
 * descriptors.
 */
export class SchemaError extends Error {
    readonly typeName: string | undefined;

    constructor(message: string, typeName?: string) {
        super(typeName ? `Type ${typeName}: ${message}` : message);
        this.name = "SchemaError";
        this.typeName = typeName;
    }
}
