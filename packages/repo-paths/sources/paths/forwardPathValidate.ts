import { FileName } from "./fileName.js";
import { isPathError, PathError } from "./pathError.js";

const DRIVE_PREFIX = /^[A-Za-z]:/;

/**
 * Checks that a string is a normalized forward-relative path.
 * The empty string is valid and denotes the zero-component path.
 * Throws `invalid_path`, `non_normalized_component` or `invalid_file_name`.
 */
export function forwardPathValidate(value: string): void {
    if (value.length === 0) {
        return;
    }
    if (forwardPathIsAbsolute(value)) {
        throw new PathError("invalid_path", value, `Path must be relative: ${JSON.stringify(value)}`);
    }

    for (const component of value.split("/")) {
        if (component.length === 0) {
            throw new PathError(
                "invalid_path",
                value,
                `Path must not contain empty components: ${JSON.stringify(value)}`
            );
        }
        if (component === "." || component === "..") {
            throw new PathError(
                "non_normalized_component",
                value,
                `Path must not contain "${component}" components: ${JSON.stringify(value)}`
            );
        }
        try {
            FileName.validate(component);
        } catch (error) {
            if (!isPathError(error)) {
                throw error;
            }
            throw new PathError(
                "invalid_file_name",
                value,
                `Invalid component in ${JSON.stringify(value)}: ${error.message}`,
                { cause: error }
            );
        }
    }
}

/**
 * True for rooted strings on any supported platform: `/x`, `\x`, `C:` and `C:\x`.
 */
export function forwardPathIsAbsolute(value: string): boolean {
    return value.startsWith("/") || value.startsWith("\\") || DRIVE_PREFIX.test(value);
}
