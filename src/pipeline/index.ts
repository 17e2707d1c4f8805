/**
 * Pipeline モジュール
 */

export { ReleasePipeline } from "./release-pipeline.js";
export type { ReleasePipelineOptions, RunParams } from "./release-pipeline.js";
export { ReleaseStateMachine } from "./state-machine.js";
export { STAGE_TRANSITIONS, STAGE_DESCRIPTIONS, isTerminalStage, canTransition } from "./stages.js";
export { IllegalStageTransitionError } from "./errors.js";
export { RunJournal, RunJournalError, isReleaseRunId } from "./run-journal.js";
export type { JournalEntry, RunJournalOptions } from "./run-journal.js";
