import { FileName } from "./fileName.js";

/**
 * Lazily yields the components of a normalized forward path in order.
 * Every call starts a fresh scan.
 */
export function* forwardPathComponents(value: string): Generator<FileName, undefined, undefined> {
    if (value.length === 0) {
        return;
    }
    let start = 0;
    while (true) {
        const slash = value.indexOf("/", start);
        if (slash === -1) {
            yield FileName.uncheckedNew(value.slice(start));
            return;
        }
        yield FileName.uncheckedNew(value.slice(start, slash));
        start = slash + 1;
    }
}
