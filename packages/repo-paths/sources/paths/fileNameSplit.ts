export type FileNameParts = {
    stem: string;
    extension: string | null;
};

/**
 * Splits a file name into stem and extension at its last `.`.
 * A `.` at index 0 never starts an extension, so `.gitignore` has no extension.
 * Expects: name is a validated file name.
 */
export function fileNameSplit(name: string): FileNameParts {
    const dot = name.lastIndexOf(".");
    if (dot <= 0) {
        return { stem: name, extension: null };
    }
    return { stem: name.slice(0, dot), extension: name.slice(dot + 1) };
}
