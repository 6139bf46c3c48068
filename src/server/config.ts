import { build as esbuild } from "esbuild";
import fs from "fs";
import path from "path";
import { pathToFileURL } from "url";

import { log } from "../utils/logger.js";
import type { SEODefinition } from "./defineSEO.js";
import { isMetadataError } from "./errors.js";
import { SEORegistry } from "./registry.js";
import { DEFAULT_INDENT } from "./render.js";

/**
 * pagemeta configuration, default-exported from `pagemeta.config.{js,mjs,ts}`
 * at the project root.
 */
export interface PageMetaConfig {
    /**
     * Leading spaces added before each rendered tag line.
     *
     * @default 4
     */
    pad?: number;

    /**
     * Log a warning for every static page route without metadata, and for
     * every registered path that no page route serves.
     *
     * @default true
     */
    warn?: boolean;

    /**
     * Directory holding file-based page routes, relative to the project root.
     * Scanned for the route check.
     *
     * @default "src/pages"
     */
    pagesDir?: string;

    /**
     * Explicit list of GET page paths for the route check. When set, the
     * pages directory is not scanned.
     */
    routes?: string[];

    /**
     * Page metadata created with `defineSEO`.
     */
    pages?: SEODefinition[];
}

export const CONFIG_FILES = ["pagemeta.config.js", "pagemeta.config.mjs", "pagemeta.config.ts"];

const DEFAULT_PAGES_DIR = "src/pages";

let cachedConfig: PageMetaConfig | null = null;

export function defineConfig(config: PageMetaConfig): PageMetaConfig {
    return config;
}

function isConfigObject(value: unknown): value is PageMetaConfig {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function hasDefaultExport(module: unknown): module is { default: unknown } {
    return typeof module === "object" && module !== null && "default" in module;
}

/**
 * Bundle a TypeScript config file to a temporary .mjs beside it, import it,
 * then remove the temporary file. Bare imports stay external so they resolve
 * from the project's node_modules.
 */
async function importTsConfig(configPath: string): Promise<unknown> {
    const result = await esbuild({
        entryPoints: [configPath],
        bundle: true,
        platform: "node",
        format: "esm",
        target: "node20",
        packages: "external",
        write: false,
        logLevel: "silent",
    });

    const output = result.outputFiles?.[0];
    if (!output) {
        throw new Error(`esbuild produced no output for ${configPath}`);
    }

    const tempPath = `${configPath}.timestamp-${Date.now()}.mjs`;
    fs.writeFileSync(tempPath, output.text);
    try {
        return await import(/* @vite-ignore */ pathToFileURL(tempPath).href);
    } finally {
        fs.unlinkSync(tempPath);
    }
}

async function importConfigModule(configPath: string): Promise<unknown> {
    if (configPath.endsWith(".ts")) {
        return importTsConfig(configPath);
    }

    const fileUrl = pathToFileURL(configPath).href;
    return import(/* @vite-ignore */ `${fileUrl}?t=${Date.now()}`);
}

/**
 * Load the configuration from the project root. `PAGEMETA_CONFIG_DIR` is
 * searched first when set. Results are cached for the lifetime of the
 * process.
 *
 * A file that cannot be imported is skipped with a warning. Metadata and
 * registry errors raised while the file is evaluated are rethrown.
 */
export async function loadConfig(root: string = process.cwd()): Promise<PageMetaConfig> {
    if (cachedConfig) {
        return cachedConfig;
    }

    const configDir = process.env.PAGEMETA_CONFIG_DIR || root;
    const searchPaths = configDir !== root ? [configDir, root] : [root];

    for (const searchPath of searchPaths) {
        for (const configFile of CONFIG_FILES) {
            const configPath = path.join(searchPath, configFile);
            if (!fs.existsSync(configPath)) {
                continue;
            }

            try {
                const module = await importConfigModule(configPath);
                const config = hasDefaultExport(module) ? module.default : {};
                if (!isConfigObject(config)) {
                    log("warn", `${configFile} must default-export a config object, ignoring it`);
                    continue;
                }

                cachedConfig = config;
                return cachedConfig;
            } catch (err) {
                // Invalid page definitions must stop startup
                if (isMetadataError(err)) {
                    throw err;
                }
                log("warn", `Failed to load config from ${configFile}:`, err);
            }
        }
    }

    cachedConfig = {};
    return cachedConfig;
}

export function getPad(config: PageMetaConfig = {}): number {
    return config.pad ?? DEFAULT_INDENT;
}

export function getWarn(config: PageMetaConfig = {}): boolean {
    return config.warn ?? true;
}

export function getPagesDir(config: PageMetaConfig = {}): string {
    return config.pagesDir ?? DEFAULT_PAGES_DIR;
}

/**
 * Build a registry holding every page definition from the config.
 *
 * @throws the first registration error, e.g. a duplicated or dynamic path
 */
export function createRegistryFromConfig(config: PageMetaConfig = {}): SEORegistry {
    return new SEORegistry({ pad: getPad(config) }).registerAll(config.pages ?? []);
}

/**
 * Clear the cached configuration.
 */
export function clearConfigCache() {
    cachedConfig = null;
}
