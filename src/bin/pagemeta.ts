#!/usr/bin/env node
import { cac } from "cac";
import path from "path";

import { createRegistryFromConfig, getPad, loadConfig, type PageMetaConfig } from "../server/config.js";
import type { SEORegistry } from "../server/registry.js";
import { prepareProjectEnv } from "../utils/envLoader.js";
import { log } from "../utils/logger.js";
import { checkPageCoverage } from "../vite/scanner.js";

interface ProjectOptions {
    root?: string;
}

async function loadProject(options: ProjectOptions): Promise<{ root: string; config: PageMetaConfig; registry: SEORegistry }> {
    const root = path.resolve(options.root ?? process.cwd());

    prepareProjectEnv({ root, mode: process.env.NODE_ENV || "production" });

    const config = await loadConfig(root);
    const registry = createRegistryFromConfig(config);

    return { root, config, registry };
}

const cli = cac("pagemeta");

cli.command("check", "Report page routes without SEO metadata")
    .option("--root <dir>", "Project root")
    .option("--strict", "Exit with code 1 when a static page has no metadata")
    .action(async (options: ProjectOptions & { strict?: boolean }) => {
        try {
            const { root, config, registry } = await loadProject(options);
            const hasMissing = checkPageCoverage(root, config, registry);

            if (!hasMissing) {
                log("info", `✓ All static pages have SEO metadata (${registry.size} registered).`);
            }
            process.exit(hasMissing && options.strict ? 1 : 0);
        } catch (e) {
            log("error", "Route check failed:", e);
            process.exit(1);
        }
    });

cli.command("render <pagePath>", "Print the head tags registered for a path")
    .option("--root <dir>", "Project root")
    .option("--pad <count>", "Leading spaces per line")
    .action(async (pagePath: string, options: ProjectOptions & { pad?: number }) => {
        try {
            const { config, registry } = await loadProject(options);
            const tags = registry.renderFor(pagePath, options.pad ?? getPad(config));

            if (!tags) {
                log("warn", `No SEO metadata registered for path ${pagePath}`);
                process.exit(1);
            }

            process.stdout.write(`${tags.html}\n`);
            process.exit(0);
        } catch (e) {
            log("error", "Render failed:", e);
            process.exit(1);
        }
    });

cli.help();
cli.parse();
