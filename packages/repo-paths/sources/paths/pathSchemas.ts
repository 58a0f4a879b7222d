import { z } from "zod";

import { AnchoredPathBuf } from "./anchoredPath.js";
import { FileName } from "./fileName.js";
import { isPathError } from "./pathError.js";
import { RelativeForwardPathBuf } from "./relativeForwardPath.js";

/**
 * Builds a string schema that parses through a validating path constructor.
 * PathError messages become custom issues; other errors propagate.
 */
function pathSchema<T>(parse: (value: string) => T) {
    return z.string().transform((value, context) => {
        try {
            return parse(value);
        } catch (error) {
            if (!isPathError(error)) {
                throw error;
            }
            context.addIssue({
                code: z.ZodIssueCode.custom,
                message: error.message,
                params: { kind: error.kind }
            });
            return z.NEVER;
        }
    });
}

export const fileNameSchema = pathSchema((value) => FileName.create(value));

export const relativeForwardPathSchema = pathSchema((value) => RelativeForwardPathBuf.create(value));

export const anchoredPathSchema = pathSchema((value) => AnchoredPathBuf.create(value));

/**
 * Relative expression (may contain `.` and `..`) resolved against the project root.
 */
export const anchoredPathExpressionSchema = pathSchema((value) =>
    AnchoredPathBuf.empty().joinNormalized(value)
);
