import type { PathPlatform } from "../paths/forwardPathFromSystem.js";

export type PathsSettings = {
    rootDir?: string;
    platform?: PathPlatform;
};

export type PathsConfig = {
    rootDir: string | null;
    platform: PathPlatform;
};
