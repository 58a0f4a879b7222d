import { inspect } from "node:util";

import { fileNameSplit } from "./fileNameSplit.js";
import { PathError } from "./pathError.js";

const SEPARATORS = ["/", "\\"] as const;
const DRIVE_PREFIX = /^[A-Za-z]:/;
const LONE_SURROGATE = /\p{Cs}/u;

/**
 * A single validated path component.
 * Never empty, never `.` or `..`, and free of every supported platform separator.
 * A component never starts with a drive prefix (`c:`) and is well-formed UTF-16.
 */
export class FileName {
    private readonly value: string;

    private constructor(value: string) {
        this.value = value;
    }

    /**
     * Throws `invalid_file_name` when the string cannot be a path component.
     */
    static validate(value: string): void {
        if (value.length === 0) {
            throw new PathError("invalid_file_name", value, "File name must not be empty.");
        }
        if (value === "." || value === "..") {
            throw new PathError("invalid_file_name", value, `File name must not be "${value}".`);
        }
        for (const separator of SEPARATORS) {
            if (value.includes(separator)) {
                throw new PathError(
                    "invalid_file_name",
                    value,
                    `File name must not contain "${separator}": ${JSON.stringify(value)}`
                );
            }
        }
        if (DRIVE_PREFIX.test(value)) {
            throw new PathError(
                "invalid_file_name",
                value,
                `File name must not start with a drive prefix: ${JSON.stringify(value)}`
            );
        }
        if (LONE_SURROGATE.test(value)) {
            throw new PathError(
                "invalid_file_name",
                value,
                `File name must be well-formed UTF-16: ${JSON.stringify(value)}`
            );
        }
    }

    static create(value: string): FileName {
        FileName.validate(value);
        return new FileName(value);
    }

    /**
     * Wraps a component without validation.
     * Expects: value was taken from an already-normalized path or is a known constant.
     */
    static uncheckedNew(value: string): FileName {
        return new FileName(value);
    }

    asStr(): string {
        return this.value;
    }

    fileStem(): string {
        return fileNameSplit(this.value).stem;
    }

    extension(): string | null {
        return fileNameSplit(this.value).extension;
    }

    equals(other: FileName | string): boolean {
        return this.value === (typeof other === "string" ? other : other.value);
    }

    compare(other: FileName): number {
        return this.value < other.value ? -1 : this.value > other.value ? 1 : 0;
    }

    toString(): string {
        return this.value;
    }

    toJSON(): string {
        return this.value;
    }

    [inspect.custom](): string {
        return `FileName(${JSON.stringify(this.value)})`;
    }
}
