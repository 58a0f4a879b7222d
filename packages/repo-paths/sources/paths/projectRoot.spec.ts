import { describe, expect, it } from "vitest";

import { AnchoredPath } from "./anchoredPath.js";
import { isPathError } from "./pathError.js";
import { ProjectRoot } from "./projectRoot.js";

function caught(run: () => unknown): unknown {
    try {
        run();
    } catch (error) {
        return error;
    }
    return null;
}

describe("ProjectRoot", () => {
    describe("posix", () => {
        const root = ProjectRoot.create("/srv/mono/", { platform: "posix" });

        it("normalizes the root", () => {
            expect(root.root).toBe("/srv/mono");
            expect(`${root}`).toBe("/srv/mono");
        });

        it("relativizes paths under the root", () => {
            const anchored = root.relativize("/srv/mono/tools/build.json");

            expect(anchored.equals(AnchoredPath.create("tools/build.json"))).toBe(true);
            expect(root.relativize("/srv/mono").isEmpty()).toBe(true);
            expect(root.relativize("/srv/mono/apps/./web/../docs").asStr()).toBe("apps/docs");
            expect(root.relativize("/srv/mono/..cache").asStr()).toBe("..cache");
        });

        it("resolves anchored paths back to absolute paths", () => {
            const anchored = AnchoredPath.create("tools/build.json");

            expect(root.resolve(anchored)).toBe("/srv/mono/tools/build.json");
            expect(root.resolve(AnchoredPath.empty())).toBe("/srv/mono");
            expect(root.relativize(root.resolve(anchored)).equals(anchored)).toBe(true);
        });

        it("resolves normalized joins inside the root", () => {
            const anchored = root.relativize("/srv/mono/tools/build.json");
            const sibling = anchored.joinNormalized("../src");

            expect(sibling.asStr()).toBe("tools/src");
            expect(root.resolve(sibling)).toBe("/srv/mono/tools/src");
            expect(root.resolveFrom(anchored, "../src")).toBe("/srv/mono/tools/src");
            expect(isPathError(caught(() => root.resolveFrom(anchored, "../../../etc")), "path_escapes_root")).toBe(
                true
            );
        });

        it("rejects paths outside the root", () => {
            expect(isPathError(caught(() => root.relativize("/srv")), "path_outside_root")).toBe(true);
            expect(isPathError(caught(() => root.relativize("/srv/monox/a")), "path_outside_root")).toBe(
                true
            );
            expect(() => root.relativize("/etc/passwd")).toThrow(
                'Path "/etc/passwd" is outside project root "/srv/mono".'
            );
            expect(root.contains("/srv/mono/a")).toBe(true);
            expect(root.contains("/srv/monox")).toBe(false);
            expect(root.contains("relative/a")).toBe(false);
        });

        it("rejects drive-prefixed names at any depth", () => {
            expect(isPathError(caught(() => root.relativize("/srv/mono/c:foo")), "invalid_path")).toBe(true);
            expect(isPathError(caught(() => root.relativize("/srv/mono/pkg/c:foo")), "invalid_file_name")).toBe(
                true
            );
            expect(root.relativize("/srv/mono/pkg/foo:bar").asStr()).toBe("pkg/foo:bar");
        });

        it("rejects relative input", () => {
            expect(isPathError(caught(() => root.relativize("tools/build.json")), "invalid_path")).toBe(true);
            expect(isPathError(caught(() => ProjectRoot.create("repo", { platform: "posix" })), "invalid_path")).toBe(
                true
            );
        });
    });

    describe("win32", () => {
        const root = ProjectRoot.create("C:\\work\\mono\\", { platform: "win32" });

        it("relativizes drive paths with either separator", () => {
            expect(root.root).toBe("C:\\work\\mono");
            expect(root.relativize("C:\\work\\mono\\tools\\build.json").asStr()).toBe("tools/build.json");
            expect(root.relativize("c:/work/mono/tools/build.json").asStr()).toBe("tools/build.json");
        });

        it("resolves with native separators", () => {
            expect(root.resolve(AnchoredPath.create("tools/build.json"))).toBe("C:\\work\\mono\\tools\\build.json");
        });

        it("rejects other drives and rootless forms", () => {
            expect(isPathError(caught(() => root.relativize("D:\\work\\mono")), "path_outside_root")).toBe(true);
            expect(isPathError(caught(() => root.relativize("\\work\\mono\\x")), "invalid_path")).toBe(true);
            expect(isPathError(caught(() => ProjectRoot.create("\\work", { platform: "win32" })), "invalid_path")).toBe(
                true
            );
        });
    });
});
