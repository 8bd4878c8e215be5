/**
 * Scanner module exports
 */

export {
  classifyTask,
  commandResultMessage,
  dueMessage,
  dueSoonMessage,
  dueSoonWindow,
} from "./classify.js";
export { type CommandRunner, TaskScanner, type TaskScannerOptions } from "./scanner.js";
