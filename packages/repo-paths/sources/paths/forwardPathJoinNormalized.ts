import { FileName } from "./fileName.js";
import { forwardPathIsAbsolute } from "./forwardPathValidate.js";
import { isPathError, PathError } from "./pathError.js";

/**
 * Resolves a relative expression that may contain `.`, `..` and empty segments against a
 * normalized base path in one left-to-right scan over a component stack.
 * Throws `path_escapes_root` when `..` pops past the base's first component,
 * `invalid_path` for rooted expressions and `invalid_file_name` for bad segments.
 * Expects: base is a normalized forward path.
 */
export function forwardPathJoinNormalized(base: string, expression: string): string {
    if (forwardPathIsAbsolute(expression)) {
        throw new PathError(
            "invalid_path",
            expression,
            `Cannot join an absolute path: ${JSON.stringify(expression)}`
        );
    }

    const stack = base.length === 0 ? [] : base.split("/");
    for (const segment of expression.split("/")) {
        if (segment.length === 0 || segment === ".") {
            continue;
        }
        if (segment === "..") {
            if (stack.length === 0) {
                throw new PathError(
                    "path_escapes_root",
                    expression,
                    `Path ${JSON.stringify(expression)} escapes ${base.length === 0 ? "the root" : JSON.stringify(base)}.`
                );
            }
            stack.pop();
            continue;
        }
        try {
            FileName.validate(segment);
        } catch (error) {
            if (!isPathError(error)) {
                throw error;
            }
            throw new PathError(
                "invalid_file_name",
                expression,
                `Invalid component in ${JSON.stringify(expression)}: ${error.message}`,
                { cause: error }
            );
        }
        stack.push(segment);
    }
    return stack.join("/");
}
