/**
 * Task store module exports
 */

export { HistoryStore, TaskStore } from "./task-store.js";
export { decodeTask, type DecodeResult, encodeTask, StoredTaskSchema } from "./codec.js";
export { readDocument, writeDocument } from "./json-document.js";
