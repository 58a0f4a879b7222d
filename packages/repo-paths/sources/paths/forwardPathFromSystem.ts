import path from "node:path";

import { forwardPathValidate } from "./forwardPathValidate.js";
import { PathError } from "./pathError.js";

export type PathPlatform = "posix" | "win32";

/**
 * Converts a host-native relative path into a normalized forward path string.
 * On win32 both separators are accepted and rewritten to `/`; drive, UNC and rooted
 * forms are rejected as absolute.
 * Expects: value is already normalized apart from its separators.
 */
export function forwardPathFromSystem(value: string, platform: PathPlatform): string {
    const flavor = platform === "win32" ? path.win32 : path.posix;
    if (flavor.isAbsolute(value) || flavor.parse(value).root.length > 0) {
        throw new PathError("invalid_path", value, `Path must be relative: ${JSON.stringify(value)}`);
    }
    const forward = platform === "win32" ? value.split(path.win32.sep).join("/") : value;
    forwardPathValidate(forward);
    return forward;
}

/**
 * Platform flavour of the running process.
 */
export function pathPlatformCurrent(): PathPlatform {
    return process.platform === "win32" ? "win32" : "posix";
}
