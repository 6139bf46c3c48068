import type { IndexHtmlTransformContext, Plugin } from "vite";

import { createRegistryFromConfig, loadConfig, type PageMetaConfig } from "../server/config.js";
import { injectHeadTags } from "../server/inject.js";
import { requestPath, type SEORegistry } from "../server/registry.js";
import { prepareProjectEnv } from "../utils/envLoader.js";
import { log } from "../utils/logger.js";
import { checkPageCoverage } from "./scanner.js";

export interface PageMetaPluginOptions {
    /** Inline configuration. When omitted, `pagemeta.config.*` is loaded from the Vite root. */
    config?: PageMetaConfig;
    /** Prebuilt registry. When omitted, one is built from the configuration. */
    registry?: SEORegistry;
}

/**
 * Page path for an HTML entry file at build time.
 * - /index.html → /
 * - /about/index.html → /about
 * - /pricing.html → /pricing
 */
export function pagePathFromHtmlFile(htmlPath: string): string {
    const withoutExtension = htmlPath.replace(/(\/index)?\.html$/, "");
    return withoutExtension || "/";
}

/**
 * Page path the HTML is being served for: the request path in dev, the path
 * derived from the entry file at build time.
 */
export function pagePathFromContext(ctx: Pick<IndexHtmlTransformContext, "path" | "originalUrl">): string {
    if (ctx.originalUrl) {
        return requestPath(ctx.originalUrl);
    }
    return pagePathFromHtmlFile(ctx.path);
}

export default function pageMeta(options: PageMetaPluginOptions = {}): Plugin {
    let root = process.cwd();
    let config: PageMetaConfig = options.config ?? {};
    let registry: SEORegistry | null = options.registry ?? null;

    return {
        name: "vite-plugin-pagemeta",
        async configResolved(resolved) {
            root = resolved.root;

            // Config files may read values from .env
            prepareProjectEnv({ root, mode: resolved.mode || "development" });

            if (!options.config) {
                config = await loadConfig(root);
            }
            if (!options.registry) {
                registry = createRegistryFromConfig(config);
                log("info", `Registered SEO metadata for ${registry.size} page(s)`);
            }
        },
        buildStart() {
            if (registry) {
                checkPageCoverage(root, config, registry);
            }
        },
        transformIndexHtml: {
            order: "post",
            handler(html, ctx) {
                if (!registry) {
                    return html;
                }

                return injectHeadTags(html, registry.renderFor(pagePathFromContext(ctx)));
            },
        },
    };
}
