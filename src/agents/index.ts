/**
 * Agents barrel export.
 */
export { Critic, DEFAULT_CRITIC_PROMPT } from "./critic.js";
export type { CriticOptions } from "./critic.js";

export { ResourceSelector, fallbackSelection, DEFAULT_SELECTOR_PROMPT } from "./selector.js";
export type { SelectorOptions } from "./selector.js";
