/**
 * Pipeline exports
 */

export { processCard } from "./process-card";
export { PipelineError, ToolError } from "./errors";
export * as stages from "./stages";
