import type { IndexHtmlTransformContext, Plugin } from "vite";
import { describe, expect, it } from "vitest";

import { SEORegistry } from "../../src/server/registry.js";
import pageMeta, { pagePathFromContext, pagePathFromHtmlFile } from "../../src/vite/pageMetaPlugin.js";

async function transform(plugin: Plugin, html: string, ctx: IndexHtmlTransformContext): Promise<unknown> {
    const hook = plugin.transformIndexHtml;
    if (!hook || typeof hook === "function") {
        throw new Error("expected an object transformIndexHtml hook");
    }
    const handler = hook.handler;
    return handler(html, ctx);
}

const TEMPLATE = "<html>\n<head>\n  <title>Default</title>\n</head>\n<body></body>\n</html>";

describe("pageMetaPlugin", () => {
    describe("pagePathFromHtmlFile", () => {
        it("should map html entry files to page paths", () => {
            expect(pagePathFromHtmlFile("/index.html")).toBe("/");
            expect(pagePathFromHtmlFile("/about/index.html")).toBe("/about");
            expect(pagePathFromHtmlFile("/pricing.html")).toBe("/pricing");
        });
    });

    describe("pagePathFromContext", () => {
        it("should use the request path in dev", () => {
            expect(pagePathFromContext({ path: "/docs", originalUrl: "/docs?tab=2" })).toBe("/docs");
        });

        it("should use the html file at build time", () => {
            expect(pagePathFromContext({ path: "/about/index.html" })).toBe("/about");
        });
    });

    it("should be named", () => {
        expect(pageMeta().name).toBe("vite-plugin-pagemeta");
    });

    it("should inject tags for the requested page", async () => {
        const registry = new SEORegistry({ pad: 2 }).register("/", { title: "Home", ogType: "website" });
        const plugin = pageMeta({ registry, config: {} });

        const output = await transform(plugin, TEMPLATE, { path: "/", filename: "/project/index.html", originalUrl: "/" });

        expect(output).toBe('<html>\n<head>\n  <meta property="og:type" content="website" />\n  <title>Home</title>\n</head>\n<body></body>\n</html>');
    });

    it("should leave pages without metadata untouched", async () => {
        const registry = new SEORegistry().register("/", { title: "Home" });
        const plugin = pageMeta({ registry, config: {} });

        const output = await transform(plugin, TEMPLATE, { path: "/unknown", filename: "/project/index.html", originalUrl: "/unknown" });

        expect(output).toBe(TEMPLATE);
    });

    it("should resolve the page from the entry file during build", async () => {
        const registry = new SEORegistry({ pad: 0 }).register("/about", { title: "About" });
        const plugin = pageMeta({ registry, config: {} });

        const output = await transform(plugin, TEMPLATE, { path: "/about/index.html", filename: "/project/about/index.html" });

        expect(output).toBe("<html>\n<head>\n<title>About</title>\n</head>\n<body></body>\n</html>");
    });

    it("should pass html through before a registry exists", async () => {
        const output = await transform(pageMeta(), TEMPLATE, { path: "/", filename: "/project/index.html" });

        expect(output).toBe(TEMPLATE);
    });
});
