import { describe, expect, it } from "vitest";

import { forwardPathJoinNormalized } from "./forwardPathJoinNormalized.js";
import { forwardPathIsAbsolute, forwardPathValidate } from "./forwardPathValidate.js";
import { type PathErrorKind, isPathError } from "./pathError.js";

function kindOf(value: string): PathErrorKind | null {
    try {
        forwardPathValidate(value);
        return null;
    } catch (error) {
        return isPathError(error) ? error.kind : null;
    }
}

describe("forwardPathValidate", () => {
    it("accepts normalized relative paths", () => {
        expect(kindOf("")).toBeNull();
        expect(kindOf("foo")).toBeNull();
        expect(kindOf("foo/bar/baz.txt")).toBeNull();
        expect(kindOf(".config/build.json")).toBeNull();
        expect(kindOf("a..b/c")).toBeNull();
    });

    it("rejects absolute paths", () => {
        expect(kindOf("/abs/bar")).toBe("invalid_path");
        expect(kindOf("\\abs")).toBe("invalid_path");
        expect(kindOf("C:/work")).toBe("invalid_path");
        expect(kindOf("c:")).toBe("invalid_path");
    });

    it("rejects redundant separators", () => {
        expect(kindOf("foo//bar")).toBe("invalid_path");
        expect(kindOf("foo/")).toBe("invalid_path");
    });

    it("rejects dot components", () => {
        expect(kindOf("normalize/./bar")).toBe("non_normalized_component");
        expect(kindOf("normalize/../bar")).toBe("non_normalized_component");
        expect(kindOf(".")).toBe("non_normalized_component");
        expect(kindOf("..")).toBe("non_normalized_component");
    });

    it("rejects components containing a backslash", () => {
        expect(kindOf("foo\\bar")).toBe("invalid_file_name");
        expect(() => forwardPathValidate("a/b\\c")).toThrow('Invalid component in "a/b\\\\c"');
    });

    it("rejects drive prefixes in every component", () => {
        expect(kindOf("c:foo")).toBe("invalid_path");
        expect(kindOf("x/c:foo")).toBe("invalid_file_name");
        expect(kindOf("x/y/D:")).toBe("invalid_file_name");
        expect(kindOf("x/foo:bar")).toBeNull();
    });

    it("agrees with joinNormalized on drive prefixes", () => {
        expect(() => forwardPathJoinNormalized("x", "c:foo")).toThrow("Cannot join an absolute path");
        expect(() => forwardPathJoinNormalized("x", "y/c:foo")).toThrow('Invalid component in "y/c:foo"');
        expect(forwardPathJoinNormalized("x", "y/foo:bar")).toBe("x/y/foo:bar");
    });
});

describe("forwardPathIsAbsolute", () => {
    it("detects rooted strings of every flavour", () => {
        expect(forwardPathIsAbsolute("/usr")).toBe(true);
        expect(forwardPathIsAbsolute("\\\\server\\share")).toBe(true);
        expect(forwardPathIsAbsolute("D:\\code")).toBe(true);
        expect(forwardPathIsAbsolute("code/D:")).toBe(false);
        expect(forwardPathIsAbsolute("")).toBe(false);
    });
});
