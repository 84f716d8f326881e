#!/usr/bin/env node

import { parseInvocation } from './core/invocation';
import { enhanceError, logError } from './core/error-handler';
import { executeReplacement, exitCodeForError } from './processFiles';

async function main(): Promise<void> {
  const invocation = parseInvocation(process.argv.slice(2));
  // 使用 exitCode 而不是 process.exit，保证标准输出写完
  process.exitCode = await executeReplacement(invocation);
}

main().catch((error: unknown) => {
  const replaceError = enhanceError(error);
  logError(replaceError);
  process.exitCode = exitCodeForError(replaceError);
});
