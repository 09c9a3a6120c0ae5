export { runCommand } from "./run.js";
export { batchCommand } from "./batch.js";
export { listTranscriptsCommand, showTranscriptCommand } from "./transcripts.js";
