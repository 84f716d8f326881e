import { executeReplacement, processFiles, processStdin, expandFileOperands } from "./processFiles";
import { PatternSet } from "./core/pattern-set";
import { applyReplacements } from "./core/line-transformer";
import type { TransformResult } from "./types";

// 导出核心模块
export * from "./core";
export * from "./types";

export { executeReplacement, processFiles, processStdin, expandFileOperands };

/**
 * 便捷函数：对一段多行文本执行替换，保留每行原有的换行
 */
export function replaceText(text: string, pairArgs: readonly string[]): TransformResult {
  const patterns = PatternSet.fromArgs(pairArgs);
  let changed = false;
  const lines = text.split("\n").map((line) => {
    const result = applyReplacements(line, patterns);
    changed = changed || result.changed;
    return result.line;
  });
  return { line: lines.join("\n"), changed };
}

export default replaceText;
