export { DEFAULT_TIMEOUT_MS, extractCommand, runCommand, type RunOptions } from "./command-runner.js";
