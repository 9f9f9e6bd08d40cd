export * from "./lib/task";
export * from "./lib/errors";
export * from "./lib/stream";
export * from "./lib/task-store";
export * from "./lib/storage";
export * from "./lib/memory-storage";
export * from "./lib/local-task-store";
export * from "./lib/remote-api";
export * from "./lib/http-remote-api";
export * from "./lib/remote-task-store";
export * from "./lib/fan-out";
export * from "./lib/task-repository";
export * from "./lib/log";
