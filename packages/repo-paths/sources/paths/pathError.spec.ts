import { describe, expect, it } from "vitest";

import { isPathError, PathError } from "./pathError.js";

describe("PathError", () => {
    it("carries kind, input and cause", () => {
        const cause = new Error("inner");
        const error = new PathError("not_a_prefix", "foo/bar", "not a prefix", { cause });

        expect(error.name).toBe("PathError");
        expect(error.kind).toBe("not_a_prefix");
        expect(error.input).toBe("foo/bar");
        expect(error.message).toBe("not a prefix");
        expect(error.cause).toBe(cause);
        expect(error).toBeInstanceOf(Error);
    });
});

describe("isPathError", () => {
    it("matches path errors by kind", () => {
        const error = new PathError("path_escapes_root", "../x", "escapes");

        expect(isPathError(error)).toBe(true);
        expect(isPathError(error, "path_escapes_root")).toBe(true);
        expect(isPathError(error, "invalid_path")).toBe(false);
    });

    it("rejects other values", () => {
        expect(isPathError(new Error("plain"))).toBe(false);
        expect(isPathError("path_escapes_root")).toBe(false);
        expect(isPathError(null)).toBe(false);
    });
});
