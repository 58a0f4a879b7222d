/**
 * Returns the normalized path without its last component, or null for the empty path.
 */
export function forwardPathParent(value: string): string | null {
    if (value.length === 0) {
        return null;
    }
    const slash = value.lastIndexOf("/");
    return slash === -1 ? "" : value.slice(0, slash);
}

/**
 * Returns the last component of a normalized path, or null for the empty path.
 */
export function forwardPathLastComponent(value: string): string | null {
    if (value.length === 0) {
        return null;
    }
    return value.slice(value.lastIndexOf("/") + 1);
}
