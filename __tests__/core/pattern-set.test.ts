import { expect, test, describe } from "vitest";
import { PatternSet } from "../../src/core/pattern-set";
import { ReplaceError } from "../../src/core/error-handler";

function captureError(fn: () => unknown): ReplaceError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ReplaceError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a ReplaceError");
}

describe("PatternSet", () => {
  describe("构造与校验", () => {
    test("参数个数为奇数时抛出 InvalidArgumentError", () => {
      const error = captureError(() => PatternSet.fromArgs(["a", "b", "c"]));

      expect(error.kind).toBe("InvalidArgumentError");
      expect(error.code).toBe("ARG001");
      expect(error.message).toBe("Replace strings must be in from/to pairs (got 3 arguments)");
    });

    test("少于两个参数时抛出 InvalidArgumentError", () => {
      expect(captureError(() => PatternSet.fromArgs([])).code).toBe("ARG001");
      expect(captureError(() => PatternSet.fromArgs(["a"])).code).toBe("ARG001");
    });

    test("直接构造空集合时抛出 ARG002", () => {
      const error = captureError(() => new PatternSet([]));

      expect(error.code).toBe("ARG002");
      expect(error.fatal).toBe(true);
    });

    test("替换对记录声明顺序并且不可修改", () => {
      const patterns = PatternSet.fromArgs(["a", "1", "b", "2"]);

      expect(patterns.size).toBe(2);
      expect(patterns.pairs).toEqual([
        { from: "a", to: "1", index: 0 },
        { from: "b", to: "2", index: 1 },
      ]);
      expect(Object.isFrozen(patterns.pairs[0])).toBe(true);
    });
  });

  describe("排序", () => {
    test("按 from 长度降序，等长保持声明顺序", () => {
      const patterns = PatternSet.fromArgs(["a", "1", "abc", "3", "ab", "2", "xy", "4"]);

      expect([...patterns].map((pair) => pair.from)).toEqual(["abc", "ab", "xy", "a"]);
    });

    test("describe 按匹配顺序列出替换对", () => {
      const patterns = PatternSet.fromArgs(["foo", "bar", "some", "other"]);

      expect(patterns.describe()).toEqual(["  'some' -> 'other'", "  'foo' -> 'bar'"]);
    });
  });

  describe("findLongestMatch", () => {
    const patterns = PatternSet.fromArgs(["a", "Y", "ab", "X", "", "E"]);

    test("返回当前位置的最长匹配", () => {
      expect(patterns.findLongestMatch("xabc", 1)?.to).toBe("X");
    });

    test("位置不匹配时返回 undefined", () => {
      expect(patterns.findLongestMatch("xabc", 0)).toBeUndefined();
    });

    test("只有空模式时什么也不匹配", () => {
      const onlyEmpty = PatternSet.fromArgs(["", "E"]);
      expect(onlyEmpty.findLongestMatch("abc", 0)).toBeUndefined();
    });
  });

  describe("withEncoding", () => {
    test("utf8 返回同一个集合", () => {
      const patterns = PatternSet.fromArgs(["é", "e"]);
      expect(patterns.withEncoding("utf8")).toBe(patterns);
    });

    test("latin1 下模式按 UTF-8 字节表达", () => {
      const patterns = PatternSet.fromArgs(["é", "e", "ab", "c"]).withEncoding("latin1");

      expect(patterns.pairs.map((pair) => [pair.from, pair.to, pair.index])).toEqual([
        ["Ã©", "e", 0],
        ["ab", "c", 1],
      ]);
    });
  });
});
