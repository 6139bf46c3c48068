import type { IncomingMessage } from "http";

import type { SEODefinition } from "./defineSEO.js";
import { DuplicatePathError, InvalidPathError } from "./errors.js";
import { createMetadata, type MetadataInput, type PageMetadata } from "./metadata.js";
import { DEFAULT_INDENT, raw, renderMetadata, type SafeHTML } from "./render.js";

export interface SEORegistryOptions {
    /** Leading spaces for each rendered tag line. @default 4 */
    pad?: number;
}

// Characters the page router uses for dynamic segments: `:id`, `*slug`, `[id]`
const DYNAMIC_SEGMENT = /[:*[\]]/;

export function isStaticPath(path: string): boolean {
    return !DYNAMIC_SEGMENT.test(path);
}

/**
 * Path component of a request URL. The query string and fragment are
 * dropped; nothing else is normalized.
 */
export function requestPath(url: string | undefined): string {
    const pathname = (url ?? "").split("?")[0].split("#")[0];
    return pathname || "/";
}

/**
 * Exact-match map from static page paths to their metadata.
 *
 * Fill it once at startup, then only read from it. Looking up a path that
 * was never registered returns `null` and never throws.
 */
export class SEORegistry {
    private entries = new Map<string, PageMetadata>();
    private readonly pad: number;

    constructor(options: SEORegistryOptions = {}) {
        const pad = options.pad ?? DEFAULT_INDENT;
        if (!Number.isInteger(pad) || pad < 0) {
            throw new RangeError(`pad must be a non-negative integer, got ${pad}`);
        }
        this.pad = pad;
    }

    get size(): number {
        return this.entries.size;
    }

    /**
     * Bind metadata to a path. The fields are validated and copied into a
     * record owned by this entry.
     *
     * @throws InvalidPathError for an empty path or one with dynamic segments
     * @throws DuplicatePathError when the path is already registered
     */
    register(path: string, metadata: MetadataInput): this {
        if (!path) {
            throw new InvalidPathError(path, "path must not be empty");
        }
        if (!isStaticPath(path)) {
            throw new InvalidPathError(path, "dynamic segments are not supported");
        }
        if (this.entries.has(path)) {
            throw new DuplicatePathError(path);
        }

        this.entries.set(path, createMetadata(metadata));
        return this;
    }

    registerAll(definitions: SEODefinition[]): this {
        for (const definition of definitions) {
            this.register(definition.path, definition.metadata);
        }
        return this;
    }

    has(path: string): boolean {
        return this.entries.has(path);
    }

    /** Registered paths in registration order. */
    paths(): string[] {
        return [...this.entries.keys()];
    }

    lookup(path: string): PageMetadata | null {
        return this.entries.get(path) ?? null;
    }

    /**
     * Render the tags for a path. `null` means nothing is registered and the
     * caller should leave the block out; a registered record without fields
     * renders to an empty string.
     */
    renderFor(path: string, indentWidth: number = this.pad): SafeHTML | null {
        const metadata = this.lookup(path);
        if (!metadata) {
            return null;
        }

        return raw(renderMetadata(metadata, indentWidth));
    }

    /** Render the tags for the path of an incoming request. */
    tagsFor(req: Pick<IncomingMessage, "url">, indentWidth?: number): SafeHTML | null {
        return this.renderFor(requestPath(req.url), indentWidth);
    }
}
