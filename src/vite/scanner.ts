import fs from "fs";
import path from "path";

import { getPagesDir, getWarn, type PageMetaConfig } from "../server/config.js";
import type { SEORegistry } from "../server/registry.js";
import { checkRoutes, reportRouteCoverage, type PageRoute } from "../server/routeCheck.js";

const PAGE_FILE = /\.(tsx|jsx|ts|js)$/;

export function normalizeToPosix(value: string): string {
    return value.split(path.sep).join("/");
}

/**
 * Convert a page file path, relative to the pages directory, to a route pattern.
 * Examples:
 * - index.tsx → /
 * - tasks/index.tsx → /tasks
 * - tasks/[id].tsx → /tasks/:id
 * - blog/[...slug].tsx → /blog/*slug
 * - (marketing)/pricing.tsx → /pricing
 * - 404.tsx → __404__
 */
export function pathFromFile(relativeFile: string): string {
    const withoutExtension = "/" + normalizeToPosix(relativeFile).replace(PAGE_FILE, "");

    if (withoutExtension === "/404") {
        return "__404__";
    }

    // Route groups (folders in parentheses) do not appear in the URL
    let pattern = withoutExtension.replace(/\/\([^)]+\)/g, "");

    pattern = pattern.replace(/\/index$/, "") || "/";
    pattern = pattern.replace(/\[\.\.\.(.+?)\]/g, "*$1");
    pattern = pattern.replace(/\[(.+?)\]/g, ":$1");

    return pattern;
}

/**
 * Walk the pages directory and return the GET route of every page, sorted by
 * path. Layout files and the 404 page are skipped.
 */
export function scanPageRoutes(root: string, pagesDir: string = getPagesDir()): PageRoute[] {
    const absolutePagesDir = path.resolve(root, pagesDir);

    if (!fs.existsSync(absolutePagesDir)) {
        return [];
    }

    const patterns = new Set<string>();

    function walkPages(dir: string) {
        let items: string[];
        try {
            items = fs.readdirSync(dir);
        } catch {
            // Directory might have been deleted during scan
            return;
        }

        for (const item of items) {
            const fullPath = path.join(dir, item);
            let stat: fs.Stats;
            try {
                stat = fs.statSync(fullPath);
            } catch {
                continue;
            }

            if (stat.isDirectory()) {
                walkPages(fullPath);
            } else if (PAGE_FILE.test(item)) {
                if (item.includes("_layout.")) {
                    continue;
                }

                const pattern = pathFromFile(path.relative(absolutePagesDir, fullPath));
                if (pattern !== "__404__") {
                    patterns.add(pattern);
                }
            }
        }
    }

    walkPages(absolutePagesDir);

    return [...patterns].sort().map((pattern) => ({ method: "GET", path: pattern }));
}

/**
 * Routes taking part in the route check: the configured `routes` when set,
 * otherwise the scanned pages directory.
 */
export function resolvePageRoutes(root: string, config: PageMetaConfig = {}): PageRoute[] {
    if (config.routes) {
        return config.routes.map((route) => ({ method: "GET", path: route }));
    }

    return scanPageRoutes(root, getPagesDir(config));
}

/**
 * Compare the project's page routes against the registry and log what is
 * missing. Returns true when a static page has no metadata.
 */
export function checkPageCoverage(root: string, config: PageMetaConfig, registry: SEORegistry): boolean {
    const coverage = checkRoutes(resolvePageRoutes(root, config), registry.paths());
    return reportRouteCoverage(coverage, { warn: getWarn(config) });
}
