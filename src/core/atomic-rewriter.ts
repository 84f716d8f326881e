/**
 * 原子文件重写
 * 文件内容先完整写入同目录下的临时文件，成功后才替换原文件；
 * 任何失败都会删除临时文件并保留原文件。改名是唯一的提交点。
 */

import { randomBytes } from "crypto";
import fs from "fs";
import type { FileHandle } from "fs/promises";
import path from "path";
import type { FileRewriteResult, StreamStats, TextEncoding } from "../types";
import { CONFIG_DEFAULTS } from "./config-normalizer";
import type { NormalizedReplaceOptions } from "./config-normalizer";
import {
  ReplaceError,
  createReplaceError,
  logError,
  toError,
} from "./error-handler";
import type { PatternSet } from "./pattern-set";
import { processStream } from "./stream-processor";
import type { LineSink } from "./stream-processor";

const READ_CHUNK_SIZE = 64 * 1024;
const WRITE_BUFFER_SIZE = 64 * 1024;

export interface SourceFile {
  /** 原文件权限位，提交前应用到临时文件 */
  mode: number;
  chunks: AsyncIterable<Buffer>;
  close(): Promise<void>;
}

export interface TempFile extends LineSink {
  path: string;
  /** 刷新缓冲并关闭，可重复调用 */
  close(): Promise<void>;
}

/**
 * 重写过程用到的全部文件系统操作
 * 测试可注入失败来验证回滚行为
 */
export interface FileOps {
  openSource(filePath: string): Promise<SourceFile>;
  /** 以独占方式创建，文件已存在时抛出 EEXIST */
  createTemp(tempPath: string, mode: number, encoding: TextEncoding): Promise<TempFile>;
  remove(filePath: string): Promise<void>;
  rename(fromPath: string, toPath: string): Promise<void>;
}

export type RewriteOptions = Pick<
  NormalizedReplaceOptions,
  "silent" | "verbose" | "encoding" | "commit" | "tempDir"
>;

async function* readChunks(handle: FileHandle): AsyncGenerator<Buffer> {
  while (true) {
    const buffer = Buffer.alloc(READ_CHUNK_SIZE);
    const { bytesRead } = await handle.read(buffer, 0, buffer.length, null);
    if (bytesRead === 0) {
      return;
    }
    yield buffer.subarray(0, bytesRead);
  }
}

async function writeAll(handle: FileHandle, data: Buffer): Promise<void> {
  let offset = 0;
  while (offset < data.length) {
    const { bytesWritten } = await handle.write(data, offset, data.length - offset, null);
    offset += bytesWritten;
  }
}

function createSystemError(code: string, message: string): Error {
  return Object.assign(new Error(`${code}: ${message}`), { code });
}

/**
 * 基于 fs.promises 的默认实现
 */
export const nodeFileOps: FileOps = {
  async openSource(filePath) {
    const handle = await fs.promises.open(filePath, "r");
    let closed = false;
    const close = async (): Promise<void> => {
      if (closed) return;
      closed = true;
      await handle.close();
    };

    const stat = await handle.stat().catch(async (error: unknown) => {
      await close();
      throw error;
    });
    if (stat.isDirectory()) {
      await close();
      throw createSystemError("EISDIR", `illegal operation on a directory, open '${filePath}'`);
    }

    return { mode: stat.mode & 0o7777, chunks: readChunks(handle), close };
  },

  async createTemp(tempPath, mode, encoding) {
    const handle = await fs.promises.open(tempPath, "wx", mode);
    // open 的 mode 会受 umask 影响，这里显式设置
    await handle.chmod(mode);

    let pending: Buffer[] = [];
    let pendingSize = 0;
    let closed = false;

    const flush = async (): Promise<void> => {
      if (pendingSize === 0) return;
      const data = Buffer.concat(pending, pendingSize);
      pending = [];
      pendingSize = 0;
      await writeAll(handle, data);
    };

    return {
      path: tempPath,
      async write(text) {
        const data = Buffer.from(text, encoding);
        pending.push(data);
        pendingSize += data.length;
        if (pendingSize >= WRITE_BUFFER_SIZE) {
          await flush();
        }
      },
      async close() {
        if (closed) return;
        closed = true;
        try {
          await flush();
        } finally {
          await handle.close();
        }
      },
    };
  },

  remove(filePath) {
    return fs.promises.unlink(filePath);
  },

  rename(fromPath, toPath) {
    return fs.promises.rename(fromPath, toPath);
  },
};

/**
 * 临时文件所在目录：默认与目标文件同目录，保证改名不跨文件系统
 */
export function tempDirectoryFor(filePath: string, tempDir?: string): string {
  return tempDir ?? path.dirname(path.resolve(filePath));
}

/**
 * 生成临时文件名：.<basename>.replace-<hex>.tmp
 */
export function createTempPath(filePath: string, tempDir?: string): string {
  const suffix = randomBytes(CONFIG_DEFAULTS.TEMP_RANDOM_BYTES).toString("hex");
  const name = `.${path.basename(filePath)}.${CONFIG_DEFAULTS.TEMP_PREFIX}-${suffix}${CONFIG_DEFAULTS.TEMP_SUFFIX}`;
  return path.join(tempDirectoryFor(filePath, tempDir), name);
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "EEXIST";
}

async function createUniqueTemp(
  filePath: string,
  mode: number,
  options: RewriteOptions,
  fileOps: FileOps
): Promise<TempFile> {
  let lastError: unknown;
  for (let attempt = 0; attempt < CONFIG_DEFAULTS.TEMP_NAME_ATTEMPTS; attempt++) {
    try {
      return await fileOps.createTemp(createTempPath(filePath, options.tempDir), mode, options.encoding);
    } catch (error) {
      if (!isAlreadyExists(error)) {
        throw error;
      }
      lastError = error;
    }
  }
  throw toError(lastError);
}

function warnCleanupFailure(tempPath: string, error: unknown): void {
  logError(createReplaceError("FILE004", [tempPath], { originalError: toError(error) }));
}

async function discardTemp(temp: TempFile, fileOps: FileOps): Promise<void> {
  await temp.close().catch((error: unknown) => warnCleanupFailure(temp.path, error));
  await fileOps.remove(temp.path).catch((error: unknown) => warnCleanupFailure(temp.path, error));
}

/**
 * 提交：用临时文件替换原文件
 * rename: 单次改名覆盖目标
 * remove-then-rename: 先删原文件再改名；改名失败时临时文件是唯一副本，必须保留
 */
async function commitTemp(
  filePath: string,
  temp: TempFile,
  options: RewriteOptions,
  fileOps: FileOps
): Promise<ReplaceError | undefined> {
  if (options.commit === "remove-then-rename") {
    try {
      await fileOps.remove(filePath);
    } catch (error) {
      await discardTemp(temp, fileOps);
      return createReplaceError("COMMIT001", [filePath], {
        filePath,
        originalError: toError(error),
      });
    }
  }

  try {
    await fileOps.rename(temp.path, filePath);
  } catch (error) {
    if (options.commit === "remove-then-rename") {
      return createReplaceError("COMMIT002", [filePath, temp.path], {
        filePath,
        originalError: toError(error),
        dataLossRisk: true,
        tempPath: temp.path,
      });
    }
    await discardTemp(temp, fileOps);
    return createReplaceError("COMMIT001", [filePath], {
      filePath,
      originalError: toError(error),
    });
  }

  return undefined;
}

/**
 * 重写单个文件
 * 单文件错误记录在结果中并输出日志；AllocationError 等致命错误在清理临时文件后继续抛出
 */
export async function rewriteFile(
  filePath: string,
  patterns: PatternSet,
  options: RewriteOptions,
  fileOps: FileOps = nodeFileOps
): Promise<FileRewriteResult> {
  let stats: StreamStats = { linesRead: 0, linesChanged: 0 };
  const fail = (error: ReplaceError): FileRewriteResult => {
    logError(error);
    return { filePath, success: false, ...stats, error };
  };

  let source: SourceFile;
  try {
    source = await fileOps.openSource(filePath);
  } catch (error) {
    return fail(
      createReplaceError("FILE001", [filePath], { filePath, originalError: toError(error) })
    );
  }

  let temp: TempFile;
  try {
    temp = await createUniqueTemp(filePath, source.mode, options, fileOps);
  } catch (error) {
    await source.close();
    return fail(
      createReplaceError("FILE002", [tempDirectoryFor(filePath, options.tempDir)], {
        filePath,
        originalError: toError(error),
      })
    );
  }

  try {
    stats = await processStream(source.chunks, temp, patterns, options);
    await temp.close();
  } catch (error) {
    await discardTemp(temp, fileOps);
    if (error instanceof ReplaceError && error.fatal) {
      throw error;
    }
    if (error instanceof ReplaceError && error.kind === "DecodeError") {
      return fail(
        createReplaceError("INPUT001", [filePath], { filePath, originalError: error.originalError })
      );
    }
    return fail(
      createReplaceError("FILE003", [filePath], { filePath, originalError: toError(error) })
    );
  } finally {
    await source.close();
  }

  const commitError = await commitTemp(filePath, temp, options, fileOps);
  if (commitError) {
    return fail(commitError);
  }

  if (options.verbose && !options.silent) {
    console.log(`${filePath} converted`);
  }

  return { filePath, success: true, ...stats };
}
