/**
 * 命令行参数解析
 * commander 负责选项、帮助和版本；替换对与文件列表由 "--" 分隔
 */

import { Command, Option } from "commander";
import type { Invocation } from "../types";
import { COMMIT_STRATEGIES, CONFIG_DEFAULTS, parseCommitStrategy } from "./config-normalizer";

const FILE_SEPARATOR = "--";

// 需要单独取值的选项（"--temp-dir x" 形式）
const OPTIONS_WITH_VALUE = new Set(["--temp-dir", "--commit"]);

type ProgramFlags = {
  silent?: boolean;
  verbose?: boolean;
  glob?: boolean;
  binary?: boolean;
  tempDir?: string;
  commit: string;
};

function isOptionFlag(arg: string): boolean {
  return arg.startsWith("-") && arg !== "-" && arg !== FILE_SEPARATOR;
}

/**
 * 分离命令参数和文件参数
 * 只跟在选项之后的第一个 "--" 是选项终止符（之后的替换字符串可以以 "-" 开头），
 * 下一个 "--" 才是文件分隔符；没有分隔符时全部是替换参数，输入来自标准输入
 */
export function splitOperands(rawArgs: readonly string[]): {
  commandArgs: string[];
  files: string[];
} {
  let index = 0;
  while (index < rawArgs.length && isOptionFlag(rawArgs[index])) {
    index += OPTIONS_WITH_VALUE.has(rawArgs[index]) ? 2 : 1;
  }

  const searchFrom = rawArgs[index] === FILE_SEPARATOR ? index + 1 : 0;
  const separator = rawArgs.indexOf(FILE_SEPARATOR, searchFrom);
  if (separator === -1) {
    return { commandArgs: [...rawArgs], files: [] };
  }

  return {
    commandArgs: rawArgs.slice(0, separator),
    files: rawArgs.slice(separator + 1),
  };
}

export function createProgram(): Command {
  return new Command()
    .name("replace")
    .description("Replace literal strings in files or from stdin to stdout, longest match first")
    .version("1.0.0")
    .usage("[options] from to [from to ...] [-- files...]")
    .argument("[pairs...]", "from/to string pairs")
    .option("-s, --silent", "silent mode, suppress non-error messages")
    .option("-v, --verbose", "verbose mode, report pairs and changed lines")
    .option("-g, --glob", "expand file arguments as glob patterns")
    .option("--binary", "process raw bytes instead of UTF-8 text")
    .option("--temp-dir <dir>", "directory for temporary files (default: beside each file)")
    .addOption(
      new Option("--commit <strategy>", "how the converted file replaces the original")
        .choices(COMMIT_STRATEGIES)
        .default(CONFIG_DEFAULTS.COMMIT)
    );
}

/**
 * 解析一次调用
 * 替换对个数的校验留给 PatternSet，命令行层只负责拆分
 */
export function parseInvocation(
  rawArgs: readonly string[],
  program: Command = createProgram()
): Invocation {
  const { commandArgs, files } = splitOperands(rawArgs);
  program.parse(commandArgs, { from: "user" });
  const flags = program.opts<ProgramFlags>();

  return {
    pairArgs: [...program.args],
    files,
    options: {
      silent: flags.silent ?? false,
      verbose: flags.verbose ?? false,
      expandGlobs: flags.glob ?? false,
      encoding: flags.binary ? "latin1" : "utf8",
      tempDir: flags.tempDir,
      commit: parseCommitStrategy(flags.commit),
    },
  };
}
