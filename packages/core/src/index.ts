export * from "./context";
export * from "./dispatcher";
export * from "./events";
export * from "./hub";
export { type CoreLogger, defaultLogger, type LogLevel } from "./logger";
export * from "./middleware";
export * from "./pattern";
export * from "./result";
export * from "./routing";
