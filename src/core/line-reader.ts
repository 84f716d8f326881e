import { StringDecoder } from "string_decoder";
import type { InputLine, TextEncoding } from "../types";
import { createReplaceError, toError } from "./error-handler";

interface ChunkDecoder {
  write(chunk: Buffer): string;
  end(): string;
}

/**
 * utf8 严格解码：非法字节序列抛出异常，不会被替换成 U+FFFD 后写回文件；
 * BOM 作为普通字符保留。latin1 每个字节对应一个字符，不会失败
 */
function createDecoder(encoding: TextEncoding): ChunkDecoder {
  if (encoding === "latin1") {
    return new StringDecoder("latin1");
  }
  const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });
  return {
    write: (chunk) => decoder.decode(chunk, { stream: true }),
    end: () => decoder.decode(),
  };
}

function decodeWith(decode: () => string): string {
  try {
    return decode();
  } catch (error) {
    throw createReplaceError("INPUT001", ["input"], { originalError: toError(error) });
  }
}

/**
 * 按行读取文本流
 * 只有 "\n" 结束一行，其前面的 "\r" 保留在行内容中；末行没有换行时 ending 为 ""
 */
export async function* readLines(
  chunks: AsyncIterable<string | Buffer>,
  encoding: TextEncoding
): AsyncGenerator<InputLine> {
  const decoder = createDecoder(encoding);
  let pending = "";

  for await (const chunk of chunks) {
    pending += typeof chunk === "string" ? chunk : decodeWith(() => decoder.write(chunk));

    let start = 0;
    let newline = pending.indexOf("\n", start);
    while (newline !== -1) {
      yield { text: pending.slice(start, newline), ending: "\n" };
      start = newline + 1;
      newline = pending.indexOf("\n", start);
    }
    pending = pending.slice(start);
  }

  pending += decodeWith(() => decoder.end());
  if (pending.length > 0) {
    yield { text: pending, ending: "" };
  }
}
