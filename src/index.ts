export * as server from "./server/index.js";
export * as vite from "./vite/index.js";
