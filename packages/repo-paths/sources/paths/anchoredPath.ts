import { inspect } from "node:util";

import type { FileName } from "./fileName.js";
import { type PathPlatform, pathPlatformCurrent } from "./forwardPathFromSystem.js";
import {
    type ForwardPathIter,
    RelativeForwardPath,
    RelativeForwardPathBuf,
    type RelativeForwardPathRef
} from "./relativeForwardPath.js";

/**
 * Either form of an anchored path.
 */
export type AnchoredPathRef = AnchoredPath | AnchoredPathBuf;

/**
 * Immutable normalized path whose implicit base is the project root.
 * Shares its representation with RelativeForwardPath but is a distinct type:
 * conversions between the two are explicit.
 */
export class AnchoredPath {
    private readonly inner: RelativeForwardPath;

    private constructor(inner: RelativeForwardPath) {
        this.inner = inner;
    }

    /**
     * Creates an anchored path from a normalized forward string.
     * Throws the same errors as RelativeForwardPath.create.
     */
    static create(value: string): AnchoredPath {
        return new AnchoredPath(RelativeForwardPath.create(value));
    }

    static fromSystemPath(value: string, platform: PathPlatform = pathPlatformCurrent()): AnchoredPath {
        return new AnchoredPath(RelativeForwardPath.fromSystemPath(value, platform));
    }

    /**
     * Reinterprets a relative path as anchored at the project root.
     * Expects: the caller knows `path` is relative to the root, not to another directory.
     */
    static fromForwardPath(path: RelativeForwardPathRef): AnchoredPath {
        return new AnchoredPath(RelativeForwardPath.uncheckedNew(path.asStr()));
    }

    /**
     * Wraps a string without validation.
     * Expects: value is already normalized and root-relative.
     */
    static uncheckedNew(value: string): AnchoredPath {
        return new AnchoredPath(RelativeForwardPath.uncheckedNew(value));
    }

    static empty(): AnchoredPath {
        return EMPTY_ANCHORED_PATH;
    }

    asStr(): string {
        return this.inner.asStr();
    }

    asForwardPath(): RelativeForwardPath {
        return this.inner;
    }

    isEmpty(): boolean {
        return this.inner.isEmpty();
    }

    join(path: RelativeForwardPathRef): AnchoredPathBuf {
        return AnchoredPathBuf.fromForwardPathBuf(this.inner.join(path));
    }

    /**
     * Joins a relative expression and normalizes the result.
     * Throws `path_escapes_root` when the expression climbs above the project root.
     */
    joinNormalized(expression: string): AnchoredPathBuf {
        return AnchoredPathBuf.fromForwardPathBuf(this.inner.joinNormalized(expression));
    }

    parent(): AnchoredPath | null {
        const parent = this.inner.parent();
        return parent === null ? null : new AnchoredPath(parent);
    }

    fileName(): FileName | null {
        return this.inner.fileName();
    }

    fileStem(): string | null {
        return this.inner.fileStem();
    }

    extension(): string | null {
        return this.inner.extension();
    }

    /**
     * Returns the path relative to `base`; the result is no longer anchored at the root.
     */
    stripPrefix(base: AnchoredPathRef): RelativeForwardPath {
        return this.inner.stripPrefix(base.asForwardPath());
    }

    startsWith(base: AnchoredPathRef): boolean {
        return this.inner.startsWith(base.asForwardPath());
    }

    endsWith(suffix: RelativeForwardPathRef): boolean {
        return this.inner.endsWith(suffix);
    }

    iter(): ForwardPathIter {
        return this.inner.iter();
    }

    [Symbol.iterator](): ForwardPathIter {
        return this.inner.iter();
    }

    components(): FileName[] {
        return this.inner.components();
    }

    equals(other: AnchoredPathRef | string): boolean {
        return this.asStr() === (typeof other === "string" ? other : other.asStr());
    }

    compare(other: AnchoredPathRef): number {
        return this.inner.compare(other.asForwardPath());
    }

    hashKey(): string {
        return this.inner.hashKey();
    }

    toBuf(): AnchoredPathBuf {
        return AnchoredPathBuf.uncheckedNew(this.asStr());
    }

    toString(): string {
        return this.asStr();
    }

    toJSON(): string {
        return this.asStr();
    }

    [inspect.custom](): string {
        return `AnchoredPath(${JSON.stringify(this.asStr())})`;
    }
}

const EMPTY_ANCHORED_PATH = AnchoredPath.uncheckedNew("");

/**
 * Owned anchored path. Mutation goes through push/pushNormalized on the wrapped buffer.
 */
export class AnchoredPathBuf {
    private readonly inner: RelativeForwardPathBuf;

    private constructor(inner: RelativeForwardPathBuf) {
        this.inner = inner;
    }

    static create(value: string): AnchoredPathBuf {
        return new AnchoredPathBuf(RelativeForwardPathBuf.create(value));
    }

    static fromSystemPath(value: string, platform: PathPlatform = pathPlatformCurrent()): AnchoredPathBuf {
        return new AnchoredPathBuf(RelativeForwardPathBuf.fromSystemPath(value, platform));
    }

    /**
     * Anchors a copy of a relative buffer at the project root.
     */
    static fromForwardPathBuf(path: RelativeForwardPathBuf): AnchoredPathBuf {
        return new AnchoredPathBuf(path.clone());
    }

    static uncheckedNew(value: string): AnchoredPathBuf {
        return new AnchoredPathBuf(RelativeForwardPathBuf.uncheckedNew(value));
    }

    static withCapacity(capacity: number): AnchoredPathBuf {
        return new AnchoredPathBuf(RelativeForwardPathBuf.withCapacity(capacity));
    }

    static empty(): AnchoredPathBuf {
        return new AnchoredPathBuf(RelativeForwardPathBuf.empty());
    }

    asPath(): AnchoredPath {
        return AnchoredPath.uncheckedNew(this.inner.asStr());
    }

    asStr(): string {
        return this.inner.asStr();
    }

    asForwardPath(): RelativeForwardPath {
        return this.inner.asPath();
    }

    /**
     * Gives up the anchored tag; the returned buffer is independent of this one.
     */
    intoForwardPathBuf(): RelativeForwardPathBuf {
        return this.inner.clone();
    }

    isEmpty(): boolean {
        return this.inner.isEmpty();
    }

    capacity(): number {
        return this.inner.capacity();
    }

    reserve(additional: number): void {
        this.inner.reserve(additional);
    }

    shrinkToFit(): void {
        this.inner.shrinkToFit();
    }

    shrinkTo(minCapacity: number): void {
        this.inner.shrinkTo(minCapacity);
    }

    push(path: RelativeForwardPathRef): void {
        this.inner.push(path);
    }

    pushNormalized(expression: string): void {
        this.inner.pushNormalized(expression);
    }

    join(path: RelativeForwardPathRef): AnchoredPathBuf {
        return this.asPath().join(path);
    }

    joinNormalized(expression: string): AnchoredPathBuf {
        return this.asPath().joinNormalized(expression);
    }

    parent(): AnchoredPath | null {
        return this.asPath().parent();
    }

    fileName(): FileName | null {
        return this.inner.fileName();
    }

    fileStem(): string | null {
        return this.inner.fileStem();
    }

    extension(): string | null {
        return this.inner.extension();
    }

    stripPrefix(base: AnchoredPathRef): RelativeForwardPath {
        return this.inner.stripPrefix(base.asForwardPath());
    }

    startsWith(base: AnchoredPathRef): boolean {
        return this.inner.startsWith(base.asForwardPath());
    }

    endsWith(suffix: RelativeForwardPathRef): boolean {
        return this.inner.endsWith(suffix);
    }

    iter(): ForwardPathIter {
        return this.inner.iter();
    }

    [Symbol.iterator](): ForwardPathIter {
        return this.inner.iter();
    }

    components(): FileName[] {
        return this.inner.components();
    }

    equals(other: AnchoredPathRef | string): boolean {
        return this.asStr() === (typeof other === "string" ? other : other.asStr());
    }

    compare(other: AnchoredPathRef): number {
        return this.inner.compare(other.asForwardPath());
    }

    hashKey(): string {
        return this.inner.hashKey();
    }

    clone(): AnchoredPathBuf {
        return new AnchoredPathBuf(this.inner.clone());
    }

    toString(): string {
        return this.asStr();
    }

    toJSON(): string {
        return this.asStr();
    }

    [inspect.custom](): string {
        return `AnchoredPathBuf(${JSON.stringify(this.asStr())})`;
    }
}
