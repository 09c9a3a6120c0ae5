export { TranscriptStore, TaskSummary } from "./sqlite.js";
export type { ListOptions, Migration } from "./sqlite.js";
