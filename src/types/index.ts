/**
 * Central type exports
 */

// Configuration
export type {
  CardClass,
  CardTypeConfig,
  CardTypesConfig,
  CardConvertConfig,
  PartialCardConvertConfig,
  LoggingConfig,
  LogLevel,
  ConfigError,
} from "./config";
export {
  CardClassSchema,
  CardConvertConfigSchema,
  PartialCardConvertConfigSchema,
} from "./config";

// Cards
export type {
  AssetBundle,
  BundleMap,
  OutputPaths,
  Card,
  CardRef,
  CardVariant,
} from "./cards";

// Pipeline
export type {
  ToolCommand,
  CommandResult,
  CommandRunner,
  ToolStageName,
  PipelineStage,
  Stage,
  StageContext,
  PipelineResult,
} from "./pipeline";

// Context
export type {
  ConversionContext,
  Issue,
  IssueType,
  CardIssue,
  ResourceIssue,
  ResourceIssueReason,
  ProcessingStats,
} from "./context";
