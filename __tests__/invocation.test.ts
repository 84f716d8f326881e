import { expect, test, describe } from "vitest";
import { createProgram, parseInvocation, splitOperands } from "../src/core/invocation";

// 让 commander 抛出异常而不是退出进程
function quietProgram() {
  return createProgram()
    .exitOverride()
    .configureOutput({ writeErr: () => {}, writeOut: () => {} });
}

describe("splitOperands", () => {
  test("没有分隔符时全部是替换参数", () => {
    expect(splitOperands(["foo", "bar"])).toEqual({ commandArgs: ["foo", "bar"], files: [] });
  });

  test("第一个 -- 之后是文件列表", () => {
    expect(splitOperands(["-v", "foo", "bar", "--", "a.txt", "b.txt"])).toEqual({
      commandArgs: ["-v", "foo", "bar"],
      files: ["a.txt", "b.txt"],
    });
  });

  test("紧跟选项的 -- 是选项终止符", () => {
    expect(splitOperands(["--", "-x", "y", "--", "f"])).toEqual({
      commandArgs: ["--", "-x", "y"],
      files: ["f"],
    });
    expect(splitOperands(["-v", "--", "-x", "y", "--", "f"])).toEqual({
      commandArgs: ["-v", "--", "-x", "y"],
      files: ["f"],
    });
  });

  test("带取值的选项会跳过它的值", () => {
    expect(splitOperands(["--temp-dir", "/tmp/x", "foo", "bar", "--", "f"])).toEqual({
      commandArgs: ["--temp-dir", "/tmp/x", "foo", "bar"],
      files: ["f"],
    });
  });

  test("末尾的 -- 后没有文件", () => {
    expect(splitOperands(["foo", "bar", "--"])).toEqual({
      commandArgs: ["foo", "bar"],
      files: [],
    });
  });
});

describe("parseInvocation", () => {
  test("默认选项", () => {
    expect(parseInvocation(["foo", "bar"], quietProgram())).toEqual({
      pairArgs: ["foo", "bar"],
      files: [],
      options: {
        silent: false,
        verbose: false,
        expandGlobs: false,
        encoding: "utf8",
        tempDir: undefined,
        commit: "rename",
      },
    });
  });

  test("解析全部选项", () => {
    const invocation = parseInvocation(
      [
        "-s",
        "-v",
        "-g",
        "--binary",
        "--temp-dir",
        "/scratch",
        "--commit",
        "remove-then-rename",
        "foo",
        "bar",
        "--",
        "a.txt",
      ],
      quietProgram()
    );

    expect(invocation).toEqual({
      pairArgs: ["foo", "bar"],
      files: ["a.txt"],
      options: {
        silent: true,
        verbose: true,
        expandGlobs: true,
        encoding: "latin1",
        tempDir: "/scratch",
        commit: "remove-then-rename",
      },
    });
  });

  test("以 - 开头的替换字符串放在 -- 之后", () => {
    const invocation = parseInvocation(["--", "-x", "y", "--", "f"], quietProgram());

    expect(invocation.pairArgs).toEqual(["-x", "y"]);
    expect(invocation.files).toEqual(["f"]);
  });

  test("替换对个数不在命令行层校验", () => {
    expect(parseInvocation(["foo"], quietProgram()).pairArgs).toEqual(["foo"]);
  });

  test("非法的提交策略被 commander 拒绝", () => {
    expect(() => parseInvocation(["--commit", "copy", "a", "b"], quietProgram())).toThrow(
      /copy/
    );
  });

  test("未知选项被拒绝", () => {
    expect(() => parseInvocation(["--unknown", "a", "b"], quietProgram())).toThrow();
  });
});
