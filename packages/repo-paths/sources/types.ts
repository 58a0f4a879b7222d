// Central type re-exports for cross-cutting concerns.

// Config
export type { PathsConfig, PathsSettings } from "./config/configTypes.js";
// Logging
export type { LogConfig, LogDestination, LogFormat } from "./log.js";
// Paths
export type { AnchoredPathRef } from "./paths/anchoredPath.js";
export type { FileNameParts } from "./paths/fileNameSplit.js";
export type { PathPlatform } from "./paths/forwardPathFromSystem.js";
export type { PathErrorKind } from "./paths/pathError.js";
export type { ProjectRootOptions } from "./paths/projectRoot.js";
export type { ForwardPathIter, RelativeForwardPathRef } from "./paths/relativeForwardPath.js";
