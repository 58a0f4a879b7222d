import { inspect } from "node:util";

import { FileName } from "./fileName.js";
import { fileNameSplit } from "./fileNameSplit.js";
import { forwardPathComponents } from "./forwardPathComponents.js";
import { forwardPathFromSystem, type PathPlatform, pathPlatformCurrent } from "./forwardPathFromSystem.js";
import { forwardPathJoin } from "./forwardPathJoin.js";
import { forwardPathJoinNormalized } from "./forwardPathJoinNormalized.js";
import { forwardPathLastComponent, forwardPathParent } from "./forwardPathParent.js";
import { forwardPathEndsWith, forwardPathStripPrefix } from "./forwardPathStripPrefix.js";
import { forwardPathValidate } from "./forwardPathValidate.js";
import { PathError } from "./pathError.js";

export type ForwardPathIter = Generator<FileName, undefined, undefined>;

/**
 * Either form of a relative forward path; accepted wherever only the content matters.
 */
export type RelativeForwardPathRef = RelativeForwardPath | RelativeForwardPathBuf;

/**
 * Immutable view of a normalized, forward-pointing relative path.
 * Components are separated by `/`; the empty string is the zero-component path.
 */
export class RelativeForwardPath {
    private readonly value: string;

    private constructor(value: string) {
        this.value = value;
    }

    static create(value: string): RelativeForwardPath {
        forwardPathValidate(value);
        return new RelativeForwardPath(value);
    }

    static fromSystemPath(value: string, platform: PathPlatform = pathPlatformCurrent()): RelativeForwardPath {
        return new RelativeForwardPath(forwardPathFromSystem(value, platform));
    }

    /**
     * Wraps a string without validation.
     * Expects: value is already normalized (a constant, or derived from another valid path).
     */
    static uncheckedNew(value: string): RelativeForwardPath {
        return new RelativeForwardPath(value);
    }

    static empty(): RelativeForwardPath {
        return EMPTY_PATH;
    }

    asStr(): string {
        return this.value;
    }

    isEmpty(): boolean {
        return this.value.length === 0;
    }

    join(other: RelativeForwardPathRef): RelativeForwardPathBuf {
        return RelativeForwardPathBuf.uncheckedNew(forwardPathJoin(this.value, other.asStr()));
    }

    /**
     * Resolves a relative expression such as `../sibling` against this path.
     * Throws `path_escapes_root` when the expression climbs above the empty path.
     */
    joinNormalized(expression: string): RelativeForwardPathBuf {
        return RelativeForwardPathBuf.uncheckedNew(forwardPathJoinNormalized(this.value, expression));
    }

    parent(): RelativeForwardPath | null {
        const parent = forwardPathParent(this.value);
        return parent === null ? null : new RelativeForwardPath(parent);
    }

    fileName(): FileName | null {
        const last = forwardPathLastComponent(this.value);
        return last === null ? null : FileName.uncheckedNew(last);
    }

    fileStem(): string | null {
        const last = forwardPathLastComponent(this.value);
        return last === null ? null : fileNameSplit(last).stem;
    }

    extension(): string | null {
        const last = forwardPathLastComponent(this.value);
        return last === null ? null : fileNameSplit(last).extension;
    }

    /**
     * Returns the path that, joined onto `base`, yields this path.
     * Throws `not_a_prefix` unless `base` is a whole-component prefix.
     */
    stripPrefix(base: RelativeForwardPathRef): RelativeForwardPath {
        const rest = forwardPathStripPrefix(this.value, base.asStr());
        if (rest === null) {
            throw new PathError(
                "not_a_prefix",
                base.asStr(),
                `${JSON.stringify(base.asStr())} is not a prefix of ${JSON.stringify(this.value)}.`
            );
        }
        return new RelativeForwardPath(rest);
    }

    startsWith(base: RelativeForwardPathRef): boolean {
        return forwardPathStripPrefix(this.value, base.asStr()) !== null;
    }

    endsWith(suffix: RelativeForwardPathRef): boolean {
        return forwardPathEndsWith(this.value, suffix.asStr());
    }

    iter(): ForwardPathIter {
        return forwardPathComponents(this.value);
    }

    [Symbol.iterator](): ForwardPathIter {
        return this.iter();
    }

    components(): FileName[] {
        return [...this.iter()];
    }

    equals(other: RelativeForwardPathRef | string): boolean {
        return this.value === (typeof other === "string" ? other : other.asStr());
    }

    compare(other: RelativeForwardPathRef): number {
        return stringCompare(this.value, other.asStr());
    }

    /**
     * Map key for this path; identical for views and buffers with the same content.
     */
    hashKey(): string {
        return this.value;
    }

    toBuf(): RelativeForwardPathBuf {
        return RelativeForwardPathBuf.uncheckedNew(this.value);
    }

    toString(): string {
        return this.value;
    }

    toJSON(): string {
        return this.value;
    }

    [inspect.custom](): string {
        return `RelativeForwardPath(${JSON.stringify(this.value)})`;
    }
}

const EMPTY_PATH = RelativeForwardPath.uncheckedNew("");

/**
 * Owned, growable relative forward path.
 * Mutation only happens through push/pushNormalized, which keep the content normalized.
 * Capacity methods are sizing hints with no effect on the content.
 */
export class RelativeForwardPathBuf {
    private value: string;
    private capacityHint: number;

    private constructor(value: string, capacityHint: number) {
        this.value = value;
        this.capacityHint = capacityHint;
    }

    static create(value: string): RelativeForwardPathBuf {
        forwardPathValidate(value);
        return new RelativeForwardPathBuf(value, value.length);
    }

    static fromSystemPath(value: string, platform: PathPlatform = pathPlatformCurrent()): RelativeForwardPathBuf {
        const forward = forwardPathFromSystem(value, platform);
        return new RelativeForwardPathBuf(forward, forward.length);
    }

    /**
     * Takes ownership of a string without validation.
     * Expects: value is already normalized.
     */
    static uncheckedNew(value: string): RelativeForwardPathBuf {
        return new RelativeForwardPathBuf(value, value.length);
    }

    static withCapacity(capacity: number): RelativeForwardPathBuf {
        return new RelativeForwardPathBuf("", Math.max(0, capacity));
    }

    static empty(): RelativeForwardPathBuf {
        return new RelativeForwardPathBuf("", 0);
    }

    /**
     * Immutable view of the current content; later pushes do not affect it.
     */
    asPath(): RelativeForwardPath {
        return RelativeForwardPath.uncheckedNew(this.value);
    }

    asStr(): string {
        return this.value;
    }

    isEmpty(): boolean {
        return this.value.length === 0;
    }

    capacity(): number {
        return Math.max(this.capacityHint, this.value.length);
    }

    reserve(additional: number): void {
        this.capacityHint = Math.max(this.capacityHint, this.value.length + Math.max(0, additional));
    }

    shrinkToFit(): void {
        this.capacityHint = this.value.length;
    }

    shrinkTo(minCapacity: number): void {
        this.capacityHint = Math.max(this.value.length, Math.min(this.capacity(), minCapacity));
    }

    push(path: RelativeForwardPathRef): void {
        this.value = forwardPathJoin(this.value, path.asStr());
    }

    /**
     * Appends a relative expression, resolving `.` and `..`.
     * Leaves the buffer unchanged when resolution fails.
     */
    pushNormalized(expression: string): void {
        this.value = forwardPathJoinNormalized(this.value, expression);
    }

    join(other: RelativeForwardPathRef): RelativeForwardPathBuf {
        return this.asPath().join(other);
    }

    joinNormalized(expression: string): RelativeForwardPathBuf {
        return this.asPath().joinNormalized(expression);
    }

    parent(): RelativeForwardPath | null {
        return this.asPath().parent();
    }

    fileName(): FileName | null {
        return this.asPath().fileName();
    }

    fileStem(): string | null {
        return this.asPath().fileStem();
    }

    extension(): string | null {
        return this.asPath().extension();
    }

    stripPrefix(base: RelativeForwardPathRef): RelativeForwardPath {
        return this.asPath().stripPrefix(base);
    }

    startsWith(base: RelativeForwardPathRef): boolean {
        return this.asPath().startsWith(base);
    }

    endsWith(suffix: RelativeForwardPathRef): boolean {
        return this.asPath().endsWith(suffix);
    }

    iter(): ForwardPathIter {
        return forwardPathComponents(this.value);
    }

    [Symbol.iterator](): ForwardPathIter {
        return this.iter();
    }

    components(): FileName[] {
        return [...this.iter()];
    }

    equals(other: RelativeForwardPathRef | string): boolean {
        return this.value === (typeof other === "string" ? other : other.asStr());
    }

    compare(other: RelativeForwardPathRef): number {
        return stringCompare(this.value, other.asStr());
    }

    hashKey(): string {
        return this.value;
    }

    clone(): RelativeForwardPathBuf {
        return new RelativeForwardPathBuf(this.value, this.capacityHint);
    }

    toString(): string {
        return this.value;
    }

    toJSON(): string {
        return this.value;
    }

    [inspect.custom](): string {
        return `RelativeForwardPathBuf(${JSON.stringify(this.value)})`;
    }
}

function stringCompare(left: string, right: string): number {
    if (left === right) {
        return 0;
    }
    return left < right ? -1 : 1;
}
