/**
 * 流式处理：逐行读取 → 替换 → 写出
 * 不缓存整个输入，标准输入和文件共用同一个循环
 */

import type { Writable } from "stream";
import type { StreamStats, TextEncoding } from "../types";
import type { NormalizedReplaceOptions } from "./config-normalizer";
import { readLines } from "./line-reader";
import { applyReplacements } from "./line-transformer";
import type { PatternSet } from "./pattern-set";

/**
 * 行输出目标：标准输出或临时文件
 */
export interface LineSink {
  write(text: string): Promise<void>;
}

export type StreamProcessOptions = Pick<NormalizedReplaceOptions, "silent" | "verbose" | "encoding">;

export async function processStream(
  input: AsyncIterable<string | Buffer>,
  sink: LineSink,
  patterns: PatternSet,
  options: StreamProcessOptions
): Promise<StreamStats> {
  const stats: StreamStats = { linesRead: 0, linesChanged: 0 };
  const echoChanges = options.verbose && !options.silent;

  for await (const { text, ending } of readLines(input, options.encoding)) {
    stats.linesRead++;

    const result = applyReplacements(text, patterns);
    await sink.write(result.line + ending);

    if (result.changed) {
      stats.linesChanged++;
      if (echoChanges) {
        console.log(`Replaced in line: ${result.line}`);
      }
    }
  }

  return stats;
}

/**
 * 将可写流包装为 LineSink
 * 每次写入都等待回调完成；流上的 error 事件会让后续写入失败，而不是让进程崩溃。
 * 写入失败后流会在稍后触发 error 事件，因此失败后 dispose 不移除监听器
 */
export function createStreamSink(
  stream: Writable,
  encoding: TextEncoding
): LineSink & { dispose(): void } {
  let failure: Error | undefined;
  const onError = (error: Error): void => {
    failure = failure ?? error;
  };
  stream.on("error", onError);

  return {
    write(text: string): Promise<void> {
      if (failure) {
        return Promise.reject(failure);
      }
      return new Promise<void>((resolve, reject) => {
        stream.write(text, encoding, (error) => {
          if (error) {
            failure = failure ?? error;
            reject(error);
          } else {
            resolve();
          }
        });
      });
    },
    dispose(): void {
      if (!failure) {
        stream.off("error", onError);
      }
    },
  };
}
