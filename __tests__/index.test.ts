import { expect, test } from "vitest";
import replaceText, { PatternSet } from "../src";

test("replaceText 对多行文本逐行替换", () => {
  expect(replaceText("foo\nsome foo\n", ["foo", "bar", "some", "other"])).toEqual({
    line: "bar\nother bar\n",
    changed: true,
  });
});

test("replaceText 没有匹配时 changed 为 false", () => {
  expect(replaceText("plain", ["foo", "bar"]).changed).toBe(false);
});

test("入口导出核心模块", () => {
  expect(PatternSet.fromArgs(["a", "b"]).size).toBe(1);
});
