/**
 * 配置规范化模块
 * 统一的配置处理中心，处理和规范化所有配置选项，确保配置的一致性
 */

import type { CommitStrategy, ReplaceOptions, TextEncoding } from "../types";
import { createReplaceError } from "./error-handler";

/**
 * 默认值常量 - 集中定义所有默认值
 * 所有配置默认值都应该在这里定义，避免分散在代码各处
 */
export const CONFIG_DEFAULTS = {
  SILENT: false,
  VERBOSE: false,
  ENCODING: "utf8",
  COMMIT: "rename",
  EXPAND_GLOBS: false,

  // 临时文件命名：.<basename>.<prefix>-<hex><suffix>
  TEMP_PREFIX: "replace",
  TEMP_SUFFIX: ".tmp",
  TEMP_NAME_ATTEMPTS: 8,
  TEMP_RANDOM_BYTES: 6,
} as const;

export const COMMIT_STRATEGIES: readonly CommitStrategy[] = ["rename", "remove-then-rename"];
export const TEXT_ENCODINGS: readonly TextEncoding[] = ["utf8", "latin1"];

/**
 * 规范化的处理选项 - 所有配置项都有确定的值（tempDir 除外）
 */
export interface NormalizedReplaceOptions {
  silent: boolean;
  verbose: boolean;
  encoding: TextEncoding;
  commit: CommitStrategy;
  expandGlobs: boolean;
  tempDir?: string;
}

function isCommitStrategy(value: string): value is CommitStrategy {
  return COMMIT_STRATEGIES.some((strategy) => strategy === value);
}

function isTextEncoding(value: string): value is TextEncoding {
  return TEXT_ENCODINGS.some((encoding) => encoding === value);
}

/**
 * 校验提交策略，命令行传入的是任意字符串
 */
export function parseCommitStrategy(value: string): CommitStrategy {
  if (!isCommitStrategy(value)) {
    throw createReplaceError("ARG003", ["commit", value, COMMIT_STRATEGIES.join(", ")]);
  }
  return value;
}

export function parseTextEncoding(value: string): TextEncoding {
  if (!isTextEncoding(value)) {
    throw createReplaceError("ARG003", ["encoding", value, TEXT_ENCODINGS.join(", ")]);
  }
  return value;
}

/**
 * 规范化选项
 * 静默模式优先：silent 时 verbose 不生效
 */
export function normalizeOptions(options: ReplaceOptions = {}): NormalizedReplaceOptions {
  const silent = options.silent ?? CONFIG_DEFAULTS.SILENT;
  const verbose = !silent && (options.verbose ?? CONFIG_DEFAULTS.VERBOSE);

  return {
    silent,
    verbose,
    encoding: parseTextEncoding(options.encoding ?? CONFIG_DEFAULTS.ENCODING),
    commit: parseCommitStrategy(options.commit ?? CONFIG_DEFAULTS.COMMIT),
    expandGlobs: options.expandGlobs ?? CONFIG_DEFAULTS.EXPAND_GLOBS,
    tempDir: options.tempDir || undefined,
  };
}
