export type LogLevel = "info" | "warn" | "error" | "debug";

const PREFIX = "[PageMeta]";

export function log(level: LogLevel, ...args: unknown[]): void {
    const header = `${PREFIX} ${new Date().toISOString()} ${level.toUpperCase()}`;

    switch (level) {
        case "warn":
            console.warn(header, ...args);
            break;
        case "error":
            console.error(header, ...args);
            break;
        default:
            console.log(header, ...args);
    }
}
