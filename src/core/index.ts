/**
 * 核心模块统一导出
 */

export { PatternSet } from "./pattern-set";
export { applyReplacements, scanLine } from "./line-transformer";
export { readLines } from "./line-reader";
export { processStream, createStreamSink } from "./stream-processor";
export type { LineSink, StreamProcessOptions } from "./stream-processor";
export {
  rewriteFile,
  nodeFileOps,
  createTempPath,
  tempDirectoryFor,
} from "./atomic-rewriter";
export type { FileOps, SourceFile, TempFile, RewriteOptions } from "./atomic-rewriter";
export {
  CONFIG_DEFAULTS,
  COMMIT_STRATEGIES,
  TEXT_ENCODINGS,
  normalizeOptions,
} from "./config-normalizer";
export type { NormalizedReplaceOptions } from "./config-normalizer";
export {
  ReplaceError,
  ErrorCategory,
  ErrorSeverity,
  createReplaceError,
  enhanceError,
  formatError,
  logError,
} from "./error-handler";
export type { ReplaceErrorKind } from "./error-handler";
export { createProgram, parseInvocation, splitOperands } from "./invocation";
