/**
 * 单行替换
 * 从左到右扫描，每个位置选取最长匹配，已消耗的字符不再重新检查
 */

import type { LineSegment, TransformResult } from "../types";
import { enhanceError } from "./error-handler";
import type { PatternSet } from "./pattern-set";

/**
 * 逐段扫描一行
 * 每个片段要么是一次匹配（输出 to），要么是一段连续未匹配字符的原样复制；
 * 所有片段的 length 之和等于 line.length
 */
export function* scanLine(line: string, patterns: PatternSet): Generator<LineSegment> {
  let cursor = 0;
  let copyStart = 0;

  while (cursor < line.length) {
    const pair = patterns.findLongestMatch(line, cursor);
    if (!pair) {
      cursor += 1;
      continue;
    }

    if (copyStart < cursor) {
      yield {
        kind: "copy",
        start: copyStart,
        length: cursor - copyStart,
        output: line.slice(copyStart, cursor),
      };
    }

    yield {
      kind: "match",
      start: cursor,
      length: pair.from.length,
      output: pair.to,
      pair,
    };

    cursor += pair.from.length;
    copyStart = cursor;
  }

  if (copyStart < line.length) {
    yield {
      kind: "copy",
      start: copyStart,
      length: line.length - copyStart,
      output: line.slice(copyStart),
    };
  }
}

/**
 * 对一行执行替换
 * 输出先收集为片段数组再一次性拼接；运行时无法容纳结果时抛出 AllocationError
 */
export function applyReplacements(line: string, patterns: PatternSet): TransformResult {
  const parts: string[] = [];
  let changed = false;

  try {
    for (const segment of scanLine(line, patterns)) {
      if (segment.kind === "match") {
        changed = true;
      }
      parts.push(segment.output);
    }
    return { line: parts.join(""), changed };
  } catch (error) {
    if (error instanceof RangeError) {
      throw enhanceError(error);
    }
    throw error;
  }
}
