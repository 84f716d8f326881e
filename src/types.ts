import type { ReplaceError } from "./core/error-handler";

/**
 * 单个替换对：from 为要查找的字面量，to 为替换内容
 * index 记录声明顺序，用于等长模式之间的决胜
 */
export interface ReplacementPair {
  readonly from: string;
  readonly to: string;
  readonly index: number;
}

/**
 * 单行处理结果
 * changed 只表示发生过匹配（x -> x 也算），不影响控制流程
 */
export interface TransformResult {
  line: string;
  changed: boolean;
}

/**
 * 扫描一行时产生的片段
 * match: 消耗 length 个输入字符并输出 pair.to
 * copy: 原样复制 length 个输入字符
 */
export type LineSegment =
  | {
      kind: "match";
      start: number;
      length: number;
      output: string;
      pair: ReplacementPair;
    }
  | {
      kind: "copy";
      start: number;
      length: number;
      output: string;
    };

/**
 * 读入的一行：text 不含换行符，ending 为 "\n" 或 ""（末行无换行）
 */
export interface InputLine {
  text: string;
  ending: string;
}

export type CommitStrategy = "rename" | "remove-then-rename";

export type TextEncoding = "utf8" | "latin1";

/**
 * 用户可传入的处理选项，所有字段可选
 */
export interface ReplaceOptions {
  silent?: boolean;
  verbose?: boolean;
  /** latin1 表示按字节处理，任意字节序列都能原样保留 */
  encoding?: TextEncoding;
  /** 临时文件目录，默认与目标文件同目录 */
  tempDir?: string;
  commit?: CommitStrategy;
  /** 将文件参数作为 glob 模式展开 */
  expandGlobs?: boolean;
}

export interface StreamStats {
  linesRead: number;
  linesChanged: number;
}

/**
 * 单个文件的重写结果
 */
export interface FileRewriteResult extends StreamStats {
  filePath: string;
  success: boolean;
  error?: ReplaceError;
}

/**
 * 一次完整调用：替换参数与文件参数已分离
 */
export interface Invocation {
  pairArgs: string[];
  files: string[];
  options: ReplaceOptions;
}

export const EXIT_CODES = {
  SUCCESS: 0,
  INVALID_ARGUMENTS: 1,
  PROCESSING_FAILED: 2,
  RESOURCE_EXHAUSTED: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
