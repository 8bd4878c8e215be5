/**
 * Daemon module exports
 */

export { DaemonLifecycle, isProcessAlive, type LifecycleConfig } from "./lifecycle.js";
export { type DaemonRunOptions, runDaemon } from "./run.js";
