export type PathErrorKind =
    | "invalid_path"
    | "non_normalized_component"
    | "path_escapes_root"
    | "not_a_prefix"
    | "invalid_file_name"
    | "path_outside_root";

/**
 * Error thrown by every fallible path constructor and transformation.
 * Expects: kind is stable and can be matched by callers; input is the offending raw value.
 */
export class PathError extends Error {
    readonly kind: PathErrorKind;
    readonly input: string;

    constructor(kind: PathErrorKind, input: string, message: string, options?: { cause?: unknown }) {
        super(message, { cause: options?.cause });
        this.name = "PathError";
        this.kind = kind;
        this.input = input;
    }
}

/**
 * Narrows an unknown value to a PathError, optionally of a specific kind.
 */
export function isPathError(value: unknown, kind?: PathErrorKind): value is PathError {
    if (!(value instanceof PathError)) {
        return false;
    }
    return kind === undefined || value.kind === kind;
}
