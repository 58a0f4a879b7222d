import { pathPlatformCurrent } from "../paths/forwardPathFromSystem.js";
import { ProjectRoot } from "../paths/projectRoot.js";
import { configSettingsParse } from "./configSettingsParse.js";
import type { PathsConfig, PathsSettings } from "./configTypes.js";

/**
 * Resolves settings into a frozen PathsConfig.
 * Precedence: explicit settings, then REPO_PATHS_ROOT_DIR / REPO_PATHS_PLATFORM, then defaults.
 */
export function configResolve(settings: PathsSettings = {}, env: NodeJS.ProcessEnv = process.env): PathsConfig {
    const fromEnv = configSettingsParse(
        dropEmpty({
            rootDir: env.REPO_PATHS_ROOT_DIR,
            platform: env.REPO_PATHS_PLATFORM
        })
    );
    const merged = configSettingsParse(dropEmpty({ ...fromEnv, ...settings }));

    return Object.freeze({
        rootDir: merged.rootDir ?? null,
        platform: merged.platform ?? pathPlatformCurrent()
    });
}

/**
 * Builds the ProjectRoot for a resolved config.
 * Expects: config.rootDir is set; the project root is never inferred from the working directory.
 */
export function projectRootFromConfig(config: PathsConfig): ProjectRoot {
    if (config.rootDir === null) {
        throw new Error("Project root is not configured. Set REPO_PATHS_ROOT_DIR or pass rootDir.");
    }
    return ProjectRoot.create(config.rootDir, { platform: config.platform });
}

function dropEmpty(values: Record<string, string | undefined>): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [key, value] of Object.entries(values)) {
        if (value !== undefined && value.trim().length > 0) {
            result[key] = value.trim();
        }
    }
    return result;
}
