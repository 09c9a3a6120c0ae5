export { TaskAgent } from "./agent.js";
export type { AgentEvents, AgentState, RunOptions, TaskAgentOptions, TaskState } from "./agent.js";
export { parseResponse } from "./parser.js";
export type { ActionBlock, StructuredResponse } from "./parser.js";
export { assemblePrompt, BASE_INSTRUCTIONS } from "./prompt.js";
export type { PromptPayload } from "./prompt.js";
export { TurnController, formatObservation, formatParseError } from "./turn.js";
export type { TurnContext, TurnOutcome } from "./turn.js";
