export type * from "./types.js";

export { configResolve, projectRootFromConfig } from "./config/configResolve.js";
export { configSettingsParse } from "./config/configSettingsParse.js";
export { getLogger, initLogging, resetLogging, resolveLogConfig } from "./log.js";
export { AnchoredPath, AnchoredPathBuf } from "./paths/anchoredPath.js";
export { anchoredPathsCacheKey } from "./paths/anchoredPathsCacheKey.js";
export { FileName } from "./paths/fileName.js";
export { pathPlatformCurrent } from "./paths/forwardPathFromSystem.js";
export { isPathError, PathError } from "./paths/pathError.js";
export {
    anchoredPathExpressionSchema,
    anchoredPathSchema,
    fileNameSchema,
    relativeForwardPathSchema
} from "./paths/pathSchemas.js";
export { ProjectRoot } from "./paths/projectRoot.js";
export { RelativeForwardPath, RelativeForwardPathBuf } from "./paths/relativeForwardPath.js";
