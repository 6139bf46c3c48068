/**
 * Base class for every error raised while building records or filling a
 * registry. These abort startup; they are never downgraded to warnings.
 */
export class MetadataError extends Error {}

const METADATA_ERROR_NAMES: ReadonlySet<string> = new Set([
    "InvalidEnumValueError",
    "UnknownFieldError",
    "InvalidFieldValueError",
    "InvalidPathError",
    "DuplicatePathError",
]);

/**
 * A config file bundled from TypeScript carries its own copy of these
 * classes, so a foreign instance is recognized by its name.
 */
export function isMetadataError(err: unknown): err is MetadataError {
    return err instanceof MetadataError || (err instanceof Error && METADATA_ERROR_NAMES.has(err.name));
}

/**
 * Thrown when `ogType` or `twitterCard` is given a value outside its
 * fixed set. The message lists the value and every allowed value.
 */
export class InvalidEnumValueError extends MetadataError {
    public readonly field: string;
    public readonly value: string;
    public readonly allowed: readonly string[];

    constructor(field: string, value: string, allowed: readonly string[]) {
        super(`Invalid value "${value}" for ${field}. Supported: ${allowed.map((item) => `"${item}"`).join(", ")}`);
        this.name = "InvalidEnumValueError";
        this.field = field;
        this.value = value;
        this.allowed = allowed;
    }
}

/**
 * Thrown when a field name is not one of the fifteen metadata fields.
 */
export class UnknownFieldError extends MetadataError {
    public readonly field: string;

    constructor(field: string, known: readonly string[]) {
        super(`Unknown metadata field "${field}". Known fields: ${known.join(", ")}`);
        this.name = "UnknownFieldError";
        this.field = field;
    }
}

/** Thrown for a field value that is not a non-empty string. */
export class InvalidFieldValueError extends MetadataError {
    public readonly field: string;

    constructor(field: string, reason: string) {
        super(`Field ${field} has a bad value: ${reason}`);
        this.name = "InvalidFieldValueError";
        this.field = field;
    }
}

export class InvalidPathError extends MetadataError {
    public readonly path: string;

    constructor(path: string, reason: string) {
        super(`Cannot register metadata for path "${path}": ${reason}`);
        this.name = "InvalidPathError";
        this.path = path;
    }
}

export class DuplicatePathError extends MetadataError {
    public readonly path: string;

    constructor(path: string) {
        super(`Metadata for path "${path}" is already registered`);
        this.name = "DuplicatePathError";
        this.path = path;
    }
}
