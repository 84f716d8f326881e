/**
 * 处理入口
 * 构建一次模式集合，然后处理标准输入或按顺序逐个处理文件
 */

import type { Writable } from "stream";
import { glob } from "glob";
import {
  EXIT_CODES,
  ExitCode,
  FileRewriteResult,
  Invocation,
  ReplaceOptions,
  StreamStats,
} from "./types";
import { normalizeOptions } from "./core/config-normalizer";
import type { NormalizedReplaceOptions } from "./core/config-normalizer";
import { PatternSet } from "./core/pattern-set";
import { FileOps, nodeFileOps, rewriteFile } from "./core/atomic-rewriter";
import { createStreamSink, processStream } from "./core/stream-processor";
import type { LineSink } from "./core/stream-processor";
import {
  ReplaceError,
  createReplaceError,
  enhanceError,
  logError,
  toError,
} from "./core/error-handler";

export interface StandardStreams {
  stdin: AsyncIterable<string | Buffer>;
  stdout: Writable;
}

/**
 * 标准输入 → 标准输出
 * 没有原文件需要替换，也不使用临时文件；输出失败是致命错误
 */
export async function processStdin(
  patterns: PatternSet,
  options: NormalizedReplaceOptions,
  streams: StandardStreams
): Promise<StreamStats> {
  const sink = createStreamSink(streams.stdout, options.encoding);
  const output: LineSink = {
    write: (text) =>
      sink.write(text).catch((error: unknown) => {
        const originalError = toError(error);
        throw createReplaceError("OUTPUT001", [], { originalError });
      }),
  };

  try {
    return await processStream(streams.stdin, output, patterns, options);
  } finally {
    sink.dispose();
  }
}

/**
 * 展开文件参数
 * 未开启 glob 时原样返回；开启时按参数顺序展开，每个模式内部排序并去重
 */
export async function expandFileOperands(
  operands: readonly string[],
  expandGlobs: boolean
): Promise<{ filePaths: string[]; errors: ReplaceError[] }> {
  if (!expandGlobs) {
    return { filePaths: [...operands], errors: [] };
  }

  const seen = new Set<string>();
  const filePaths: string[] = [];
  const errors: ReplaceError[] = [];

  for (const operand of operands) {
    const matches = (await glob(operand, { nodir: true })).sort();
    if (matches.length === 0) {
      const error = createReplaceError("FILE001", [operand], {
        filePath: operand,
        originalError: new Error(`No files matched pattern ${operand}`),
      });
      logError(error);
      errors.push(error);
      continue;
    }
    for (const match of matches) {
      if (!seen.has(match)) {
        seen.add(match);
        filePaths.push(match);
      }
    }
  }

  return { filePaths, errors };
}

/**
 * 按顺序处理文件
 * 单个文件失败不会中断后续文件，错误被汇总；致命错误直接抛出
 */
export async function processFiles(
  filePaths: readonly string[],
  patterns: PatternSet,
  options: ReplaceOptions = {},
  fileOps: FileOps = nodeFileOps
): Promise<{
  results: FileRewriteResult[];
  modifiedFiles: string[];
  errors: ReplaceError[];
  success: boolean;
}> {
  const normalized = normalizeOptions(options);
  const results: FileRewriteResult[] = [];
  const errors: ReplaceError[] = [];

  for (const filePath of filePaths) {
    const result = await rewriteFile(filePath, patterns, normalized, fileOps);
    results.push(result);
    if (result.error) {
      errors.push(result.error);
    }
  }

  return {
    results,
    modifiedFiles: results
      .filter((result) => result.success && result.linesChanged > 0)
      .map((result) => result.filePath),
    errors,
    success: errors.length === 0,
  };
}

/**
 * 错误对应的退出码
 */
export function exitCodeForError(error: ReplaceError): ExitCode {
  switch (error.kind) {
    case "InvalidArgumentError":
      return EXIT_CODES.INVALID_ARGUMENTS;
    case "AllocationError":
      return EXIT_CODES.RESOURCE_EXHAUSTED;
    default:
      return EXIT_CODES.PROCESSING_FAILED;
  }
}

/**
 * 完整执行一次调用并返回退出码
 * 参数错误在任何处理之前中止；文件错误累计后以非零退出码结束
 */
export async function executeReplacement(
  invocation: Invocation,
  streams: StandardStreams = { stdin: process.stdin, stdout: process.stdout },
  fileOps: FileOps = nodeFileOps
): Promise<ExitCode> {
  let options: NormalizedReplaceOptions;
  let patterns: PatternSet;
  try {
    options = normalizeOptions(invocation.options);
    patterns = PatternSet.fromArgs(invocation.pairArgs);
  } catch (error) {
    const replaceError = enhanceError(error);
    logError(replaceError);
    return exitCodeForError(replaceError);
  }

  if (options.verbose) {
    console.log("Replacement pairs:");
    for (const line of patterns.describe()) {
      console.log(line);
    }
  }

  const matcher = patterns.withEncoding(options.encoding);

  try {
    if (invocation.files.length === 0) {
      await processStdin(matcher, options, streams);
      return EXIT_CODES.SUCCESS;
    }

    const { filePaths, errors } = await expandFileOperands(invocation.files, options.expandGlobs);
    const result = await processFiles(filePaths, matcher, options, fileOps);
    return result.success && errors.length === 0
      ? EXIT_CODES.SUCCESS
      : EXIT_CODES.PROCESSING_FAILED;
  } catch (error) {
    const replaceError = enhanceError(error);
    logError(replaceError);
    return exitCodeForError(replaceError);
  }
}
