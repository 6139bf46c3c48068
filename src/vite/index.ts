import pageMeta from "./pageMetaPlugin.js";

export default pageMeta;
export { pageMeta };
export { pagePathFromContext, pagePathFromHtmlFile, type PageMetaPluginOptions } from "./pageMetaPlugin.js";
export { checkPageCoverage, pathFromFile, resolvePageRoutes, scanPageRoutes } from "./scanner.js";
