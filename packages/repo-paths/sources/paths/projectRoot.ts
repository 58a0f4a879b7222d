import path from "node:path";

import { getLogger } from "../log.js";
import { AnchoredPathBuf, type AnchoredPathRef } from "./anchoredPath.js";
import { type PathPlatform, pathPlatformCurrent } from "./forwardPathFromSystem.js";
import { PathError } from "./pathError.js";

const logger = getLogger("paths.root");

export type ProjectRootOptions = {
    platform?: PathPlatform;
};

/**
 * The absolute directory every anchored path is implicitly based at.
 * Converts host-absolute paths to anchored paths and back; never touches the filesystem.
 * Expects: root is absolute for the chosen platform flavour.
 */
export class ProjectRoot {
    readonly root: string;
    readonly platform: PathPlatform;
    private readonly flavor: path.PlatformPath;

    private constructor(root: string, platform: PathPlatform) {
        this.platform = platform;
        this.flavor = platform === "win32" ? path.win32 : path.posix;
        this.root = this.flavor.resolve(root);
    }

    static create(root: string, options: ProjectRootOptions = {}): ProjectRoot {
        const platform = options.platform ?? pathPlatformCurrent();
        if (!pathIsHostAbsolute(root, platform)) {
            throw new PathError("invalid_path", root, `Project root must be absolute: ${JSON.stringify(root)}`);
        }
        return new ProjectRoot(root, platform);
    }

    /**
     * Anchors a host-absolute path at this root.
     * Throws `invalid_path` for relative input and `path_outside_root` for paths outside the root.
     */
    relativize(absolutePath: string): AnchoredPathBuf {
        if (!pathIsHostAbsolute(absolutePath, this.platform)) {
            throw new PathError(
                "invalid_path",
                absolutePath,
                `Path must be absolute to relativize: ${JSON.stringify(absolutePath)}`
            );
        }

        const relative = this.relativeTo(absolutePath);
        if (relative === null) {
            logger.debug({ root: this.root, path: absolutePath }, "event: Rejected path outside project root");
            throw new PathError(
                "path_outside_root",
                absolutePath,
                `Path ${JSON.stringify(absolutePath)} is outside project root ${JSON.stringify(this.root)}.`
            );
        }

        return AnchoredPathBuf.fromSystemPath(relative, this.platform);
    }

    /**
     * Joins an anchored path onto the root in the host flavour. The empty path resolves to the root.
     */
    resolve(anchored: AnchoredPathRef): string {
        if (anchored.isEmpty()) {
            return this.root;
        }
        return this.flavor.join(this.root, ...anchored.components().map((component) => component.asStr()));
    }

    /**
     * Anchors a path given relative to `base`, resolving `.` and `..` without leaving the root.
     */
    resolveFrom(base: AnchoredPathRef, expression: string): string {
        return this.resolve(base.joinNormalized(expression));
    }

    /**
     * True when the host-absolute path is the root or lies beneath it.
     */
    contains(absolutePath: string): boolean {
        return pathIsHostAbsolute(absolutePath, this.platform) && this.relativeTo(absolutePath) !== null;
    }

    private relativeTo(absolutePath: string): string | null {
        const relative = this.flavor.relative(this.root, this.flavor.resolve(absolutePath));
        if (relative === ".." || relative.startsWith(`..${this.flavor.sep}`) || this.flavor.isAbsolute(relative)) {
            return null;
        }
        return relative;
    }

    toString(): string {
        return this.root;
    }
}

/**
 * Absolute in the given flavour; win32 additionally requires a drive or UNC prefix.
 */
function pathIsHostAbsolute(value: string, platform: PathPlatform): boolean {
    if (platform === "win32") {
        return path.win32.isAbsolute(value) && /^([A-Za-z]:|[\\/]{2})/.test(value);
    }
    return path.posix.isAbsolute(value);
}
