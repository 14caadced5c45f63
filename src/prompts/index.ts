export { InquirerPrompter, createPrompter } from "./prompter.js";
export type { AnswerValidator, Prompter } from "./prompter.js";
export { parseSubscriptionSelection, parseTenantChoice, toValidator } from "./selection.js";
export type { SelectionResult } from "./selection.js";
