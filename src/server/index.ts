// Public API
export * from "./config.js";
export * from "./defineSEO.js";
export * from "./errors.js";
export * from "./inject.js";
export * from "./metadata.js";
export * from "./registry.js";
export * from "./render.js";
export * from "./routeCheck.js";

export { envFilesFor, injectEnvToProcess, loadEnvFiles, prepareProjectEnv, type EnvLoadOptions, type LoadedEnv } from "../utils/envLoader.js";
export { log } from "../utils/logger.js";
