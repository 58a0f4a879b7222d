import { describe, expect, it } from "vitest";

import {
    AnchoredPath,
    anchoredPathSchema,
    anchoredPathsCacheKey,
    configResolve,
    isPathError,
    projectRootFromConfig,
    RelativeForwardPath
} from "./index.js";

describe("repo-paths", () => {
    it("moves absolute locations through anchored paths and back", () => {
        const config = configResolve({}, { REPO_PATHS_ROOT_DIR: "/work/mono", REPO_PATHS_PLATFORM: "posix" });
        const root = projectRootFromConfig(config);

        const members = ["/work/mono/apps/web", "/work/mono/packages/ui"].map((entry) => root.relativize(entry));
        expect(members.map((member) => member.asStr())).toEqual(["apps/web", "packages/ui"]);

        const manifest = members[0]?.join(RelativeForwardPath.create("package.json"));
        expect(manifest?.asStr()).toBe("apps/web/package.json");
        expect(manifest ? root.resolve(manifest) : null).toBe("/work/mono/apps/web/package.json");

        const shared = members[0]?.joinNormalized("../../packages/ui");
        expect(shared?.equals(members[1] ?? AnchoredPath.empty())).toBe(true);

        const parsed = ["packages/ui", "apps/web"].map((entry) => anchoredPathSchema.parse(entry));
        expect(anchoredPathsCacheKey(parsed)).toBe(anchoredPathsCacheKey(members));
    });

    it("refuses to leave the root", () => {
        const root = projectRootFromConfig({ rootDir: "/work/mono", platform: "posix" });
        const member = root.relativize("/work/mono/apps/web");

        let caught: unknown = null;
        try {
            member.joinNormalized("../../../secrets");
        } catch (error) {
            caught = error;
        }
        expect(isPathError(caught, "path_escapes_root")).toBe(true);
    });
});
