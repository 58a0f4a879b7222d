/**
 * Returns the suffix left after removing `base` from `value`, or null when `base`
 * is not a whole-component prefix.
 * Expects: both arguments are normalized forward paths.
 */
export function forwardPathStripPrefix(value: string, base: string): string | null {
    if (base.length === 0) {
        return value;
    }
    if (value === base) {
        return "";
    }
    if (value.startsWith(base) && value.charAt(base.length) === "/") {
        return value.slice(base.length + 1);
    }
    return null;
}

/**
 * Whole-component suffix test on normalized forward paths.
 */
export function forwardPathEndsWith(value: string, suffix: string): boolean {
    if (suffix.length === 0 || value === suffix) {
        return true;
    }
    return value.endsWith(suffix) && value.charAt(value.length - suffix.length - 1) === "/";
}
