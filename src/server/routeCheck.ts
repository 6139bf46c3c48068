import { log } from "../utils/logger.js";
import { isStaticPath } from "./registry.js";

export interface PageRoute {
    method: string;
    path: string;
}

export interface RouteCoverage {
    /** Static GET routes with no registered metadata. */
    missing: string[];
    /** Registered paths that no route serves. */
    unrouted: string[];
}

/**
 * Compare the application's routes against the registered metadata paths.
 * Only GET routes without dynamic segments take part.
 */
export function checkRoutes(routes: PageRoute[], registeredPaths: Iterable<string>): RouteCoverage {
    const staticPaths = new Set(routes.filter((route) => route.method.toUpperCase() === "GET" && isStaticPath(route.path)).map((route) => route.path));
    const registered = new Set(registeredPaths);

    const missing = [...staticPaths].filter((path) => !registered.has(path)).sort();
    const unrouted = [...registered].filter((path) => !staticPaths.has(path)).sort();

    return { missing, unrouted };
}

export interface ReportOptions {
    warn?: boolean;
}

/**
 * Log route coverage problems. Returns true when any static route is
 * missing metadata, whether or not warnings are enabled.
 */
export function reportRouteCoverage(coverage: RouteCoverage, options: ReportOptions = {}): boolean {
    const { warn = true } = options;

    if (warn) {
        for (const path of coverage.missing) {
            log("warn", `Missing SEO metadata for path ${path}`);
        }
        for (const path of coverage.unrouted) {
            log("warn", `SEO metadata registered for ${path}, but no page route serves it`);
        }
    }

    return coverage.missing.length > 0;
}
