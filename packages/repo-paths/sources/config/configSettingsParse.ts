import { z } from "zod";

import type { PathsSettings } from "./configTypes.js";

const settingsSchema = z
    .object({
        rootDir: z.string().trim().min(1, "rootDir must not be empty").optional(),
        platform: z.enum(["posix", "win32"]).optional()
    })
    .strict();

/**
 * Parses raw settings into validated PathsSettings.
 * Expects: raw is JSON-compatible; unknown keys are rejected.
 */
export function configSettingsParse(raw: unknown): PathsSettings {
    const parsed = settingsSchema.safeParse(raw);
    if (!parsed.success) {
        const details = parsed.error.issues
            .map((issue) => `${issue.path.join(".") || "settings"}: ${issue.message}`)
            .join("; ");
        throw new Error(`Invalid paths settings: ${details}`);
    }
    return parsed.data;
}
