/**
 * Concatenates two normalized forward paths.
 * Expects: both sides are normalized; the empty path is the identity.
 */
export function forwardPathJoin(base: string, child: string): string {
    if (base.length === 0) {
        return child;
    }
    if (child.length === 0) {
        return base;
    }
    return `${base}/${child}`;
}
