/**
 * 替换模式集合
 * 构造时按 from 长度降序排序，最长匹配优先由遍历顺序保证，而不是由每次查找的逻辑保证
 */

import type { ReplacementPair, TextEncoding } from "../types";
import { createReplaceError } from "./error-handler";

function createPair(from: string, to: string, index: number): ReplacementPair {
  return Object.freeze({ from, to, index });
}

/**
 * 将文本重新表达为其 UTF-8 字节（每字节一个字符），用于 latin1 模式下的按字节匹配
 */
function toByteString(text: string): string {
  return Buffer.from(text, "utf8").toString("latin1");
}

export class PatternSet implements Iterable<ReplacementPair> {
  private readonly sorted: readonly ReplacementPair[];

  constructor(pairs: readonly ReplacementPair[]) {
    if (pairs.length === 0) {
      throw createReplaceError("ARG002");
    }

    // Array.prototype.sort 是稳定排序：等长模式保持声明顺序
    this.sorted = Object.freeze(
      [...pairs].sort((a, b) => b.from.length - a.from.length)
    );
  }

  /**
   * 从扁平参数列表构造：from to from to ...
   */
  static fromArgs(args: readonly string[]): PatternSet {
    if (args.length < 2 || args.length % 2 !== 0) {
      throw createReplaceError("ARG001", [args.length]);
    }

    const pairs: ReplacementPair[] = [];
    for (let i = 0; i < args.length; i += 2) {
      pairs.push(createPair(args[i], args[i + 1], i / 2));
    }
    return new PatternSet(pairs);
  }

  get size(): number {
    return this.sorted.length;
  }

  /**
   * 按匹配顺序（长度降序）排列的替换对
   */
  get pairs(): readonly ReplacementPair[] {
    return this.sorted;
  }

  [Symbol.iterator](): Iterator<ReplacementPair> {
    return this.sorted[Symbol.iterator]();
  }

  /**
   * 查找在 cursor 处匹配的最长模式
   * 集合已按长度降序排列，第一个命中的即为最长者；等长时先声明者胜出。
   * 空模式永远不匹配，避免零宽匹配导致死循环。
   */
  findLongestMatch(line: string, cursor: number): ReplacementPair | undefined {
    for (const pair of this.sorted) {
      if (pair.from.length === 0) continue;
      if (line.startsWith(pair.from, cursor)) {
        return pair;
      }
    }
    return undefined;
  }

  /**
   * 按指定编码重新表达模式文本
   * utf8 原样返回；latin1 下模式按 UTF-8 字节匹配
   */
  withEncoding(encoding: TextEncoding): PatternSet {
    if (encoding === "utf8") {
      return this;
    }
    const byIndex = [...this.sorted].sort((a, b) => a.index - b.index);
    return new PatternSet(
      byIndex.map((pair) => createPair(toByteString(pair.from), toByteString(pair.to), pair.index))
    );
  }

  /**
   * verbose 模式下的替换对列表
   */
  describe(): string[] {
    return this.sorted.map((pair) => `  '${pair.from}' -> '${pair.to}'`);
  }
}
