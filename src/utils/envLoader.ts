import dotenv from "dotenv";
import fs from "fs";
import path from "path";

import { log } from "./logger.js";

export interface EnvLoadOptions {
    root?: string;
    mode?: string;
}

export interface LoadedEnv {
    /** Merged variables. A key from a higher-priority file wins. */
    values: Record<string, string>;
    /** Files that were read, relative to the root, highest priority first. */
    files: string[];
}

/**
 * Env files for a mode, highest priority first. `.env.local` is left out in
 * test mode so local overrides never leak into test runs.
 */
export function envFilesFor(mode: string): string[] {
    const local = mode === "test" ? [] : [".env.local"];
    return [`.env.${mode}.local`, ...local, `.env.${mode}`, ".env"];
}

/**
 * Read the env files of a project so `pagemeta.config.*` can take site URLs
 * and names from `process.env`.
 */
export function loadEnvFiles(options: EnvLoadOptions = {}): LoadedEnv {
    const { root = process.cwd(), mode = process.env.NODE_ENV || "development" } = options;

    const loaded: LoadedEnv = { values: {}, files: [] };
    for (const file of envFilesFor(mode)) {
        const envPath = path.resolve(root, file);
        if (!fs.existsSync(envPath)) {
            continue;
        }

        const parsed = dotenv.parse(fs.readFileSync(envPath, "utf-8"));
        loaded.values = { ...parsed, ...loaded.values };
        loaded.files.push(file);
    }

    return loaded;
}

/**
 * Copy variables into process.env, keeping values that are already set.
 * Returns the keys that were added.
 */
export function injectEnvToProcess(values: Record<string, string>): string[] {
    const added: string[] = [];
    for (const [key, value] of Object.entries(values)) {
        if (process.env[key] === undefined) {
            process.env[key] = value;
            added.push(key);
        }
    }
    return added;
}

/**
 * Load and inject the env files of a project before its config is imported.
 */
export function prepareProjectEnv(options: EnvLoadOptions = {}): LoadedEnv {
    const loaded = loadEnvFiles(options);
    if (loaded.files.length === 0) {
        return loaded;
    }

    const added = injectEnvToProcess(loaded.values);
    log("debug", `Loaded ${added.length} env variable(s) from ${loaded.files.join(", ")}`);
    return loaded;
}
