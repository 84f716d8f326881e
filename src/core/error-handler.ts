/**
 * 错误处理模块
 * 提供统一的错误处理机制，包括错误类型、错误生成和格式化方法
 */

// 错误类别枚举
export enum ErrorCategory {
  ARGUMENT = "ARGUMENT", // 参数错误
  RESOURCE = "RESOURCE", // 资源耗尽
  INPUT = "INPUT", // 输入内容错误
  FILE_OPERATION = "FILE_OPERATION", // 文件操作错误
  COMMIT = "COMMIT", // 提交（替换原文件）错误
  OUTPUT = "OUTPUT", // 标准输出错误
  UNKNOWN = "UNKNOWN", // 未知错误
}

// 错误严重级别
export enum ErrorSeverity {
  WARNING = "WARNING", // 警告，不会中断处理
  ERROR = "ERROR", // 错误，中断当前文件处理
  FATAL = "FATAL", // 致命错误，中断整个处理流程或有数据丢失风险
}

export type ReplaceErrorKind =
  | "InvalidArgumentError"
  | "AllocationError"
  | "OpenError"
  | "DecodeError"
  | "TempCreateError"
  | "WriteError"
  | "CommitError"
  | "CleanupError"
  | "OutputWriteError"
  | "UnknownError";

// 预定义错误代码和对应信息
export interface ErrorDefinition {
  code: string;
  kind: ReplaceErrorKind;
  category: ErrorCategory;
  messageTemplate: string;
  severity: ErrorSeverity;
  suggestionTemplate?: string;
}

// 错误定义集
const errorDefinitions: Record<string, ErrorDefinition> = {
  // 参数错误
  ARG001: {
    code: "ARG001",
    kind: "InvalidArgumentError",
    category: ErrorCategory.ARGUMENT,
    messageTemplate: "Replace strings must be in from/to pairs (got {0} arguments)",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate:
      "Pass an even number of strings before '--', at least one from/to pair",
  },
  ARG002: {
    code: "ARG002",
    kind: "InvalidArgumentError",
    category: ErrorCategory.ARGUMENT,
    messageTemplate: "A pattern set needs at least one replacement pair",
    severity: ErrorSeverity.FATAL,
  },
  ARG003: {
    code: "ARG003",
    kind: "InvalidArgumentError",
    category: ErrorCategory.ARGUMENT,
    messageTemplate: "Invalid value for {0}: {1}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate: "Allowed values: {2}",
  },

  // 资源错误
  RESOURCE001: {
    code: "RESOURCE001",
    kind: "AllocationError",
    category: ErrorCategory.RESOURCE,
    messageTemplate: "Out of memory while building replacement: {0}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate:
      "The line or its replacement is too large to hold in memory",
  },

  // 输入错误
  INPUT001: {
    code: "INPUT001",
    kind: "DecodeError",
    category: ErrorCategory.INPUT,
    messageTemplate: "{0} is not valid UTF-8 text",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate: "Use --binary to process the input byte by byte",
  },

  // 文件操作错误
  FILE001: {
    code: "FILE001",
    kind: "OpenError",
    category: ErrorCategory.FILE_OPERATION,
    messageTemplate: "Failed to open file {0}",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate: "Check that the file exists and is readable",
  },
  FILE002: {
    code: "FILE002",
    kind: "TempCreateError",
    category: ErrorCategory.FILE_OPERATION,
    messageTemplate: "Failed to create temporary file in {0}",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate:
      "The directory must be writable, or pass --temp-dir on the same filesystem",
  },
  FILE003: {
    code: "FILE003",
    kind: "WriteError",
    category: ErrorCategory.FILE_OPERATION,
    messageTemplate: "Failed to write converted content of {0}",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate: "Check free disk space; the original file was left untouched",
  },

  FILE004: {
    code: "FILE004",
    kind: "CleanupError",
    category: ErrorCategory.FILE_OPERATION,
    messageTemplate: "Failed to remove temporary file {0}",
    severity: ErrorSeverity.WARNING,
  },

  // 提交错误
  COMMIT001: {
    code: "COMMIT001",
    kind: "CommitError",
    category: ErrorCategory.COMMIT,
    messageTemplate: "Failed to replace original file {0}",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate: "The original file was left untouched",
  },
  COMMIT002: {
    code: "COMMIT002",
    kind: "CommitError",
    category: ErrorCategory.COMMIT,
    messageTemplate:
      "Original file {0} was removed but the converted file could not be moved into place",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate: "The only copy of the converted content is {1}; move it to {0} by hand",
  },

  // 输出错误
  OUTPUT001: {
    code: "OUTPUT001",
    kind: "OutputWriteError",
    category: ErrorCategory.OUTPUT,
    messageTemplate: "Error writing to output",
    severity: ErrorSeverity.FATAL,
  },

  // 通用错误
  GENERAL001: {
    code: "GENERAL001",
    kind: "UnknownError",
    category: ErrorCategory.UNKNOWN,
    messageTemplate: "Unknown error: {0}",
    severity: ErrorSeverity.ERROR,
  },
};

/**
 * 统一错误类型
 * 既可以被抛出（致命错误），也可以收集到结果中（单文件错误）
 */
export class ReplaceError extends Error {
  readonly code: string;
  readonly kind: ReplaceErrorKind;
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly details?: string;
  readonly filePath?: string;
  readonly suggestion?: string;
  readonly originalError?: Error;
  /** 原文件已删除而临时文件未能改名：临时文件是唯一副本 */
  readonly dataLossRisk: boolean;
  readonly tempPath?: string;

  constructor(
    definition: ErrorDefinition,
    message: string,
    options: ReplaceErrorOptions & { suggestion?: string }
  ) {
    super(message);
    this.name = definition.kind;
    this.code = definition.code;
    this.kind = definition.kind;
    this.category = definition.category;
    this.severity = definition.severity;
    this.details = options.originalError?.message;
    this.filePath = options.filePath;
    this.suggestion = options.suggestion;
    this.originalError = options.originalError;
    this.dataLossRisk = options.dataLossRisk ?? false;
    this.tempPath = options.tempPath;
  }

  get fatal(): boolean {
    return (
      this.kind === "InvalidArgumentError" ||
      this.kind === "AllocationError" ||
      this.kind === "OutputWriteError"
    );
  }
}

export interface ReplaceErrorOptions {
  filePath?: string;
  originalError?: Error;
  dataLossRisk?: boolean;
  tempPath?: string;
}

/**
 * 创建格式化的错误对象
 */
export function createReplaceError(
  errorCode: string,
  params: Array<string | number> = [],
  options: ReplaceErrorOptions = {}
): ReplaceError {
  const definition = errorDefinitions[errorCode] ?? errorDefinitions.GENERAL001;

  // 替换消息模板中的参数（同一占位符可出现多次）
  let message = definition.messageTemplate;
  let suggestion = definition.suggestionTemplate ?? "";

  params.forEach((param, index) => {
    message = message.split(`{${index}}`).join(String(param));
    suggestion = suggestion.split(`{${index}}`).join(String(param));
  });

  return new ReplaceError(definition, message, {
    ...options,
    suggestion: suggestion || undefined,
  });
}

/**
 * 格式化错误为日志消息
 */
export function formatError(error: ReplaceError): string {
  let formattedMessage = `[${error.code}] ${error.message}`;

  if (error.filePath) {
    formattedMessage += `\nFile: ${error.filePath}`;
  }

  if (error.details && error.details !== error.message) {
    formattedMessage += `\nDetails: ${error.details}`;
  }

  if (error.suggestion) {
    formattedMessage += `\nSuggestion: ${error.suggestion}`;
  }

  return formattedMessage;
}

/**
 * 记录错误（静默模式下同样输出）
 */
export function logError(error: ReplaceError): void {
  const formattedError = formatError(error);

  if (error.severity === ErrorSeverity.WARNING) {
    console.warn(formattedError);
  } else {
    console.error(formattedError);
  }
}

function getErrorCode(error: Error): string | undefined {
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

const OPEN_ERROR_CODES = new Set(["ENOENT", "EACCES", "EPERM", "EISDIR", "ENOTDIR", "ELOOP"]);

/**
 * 检测并处理特定类型的错误，返回更具体的错误代码
 */
export function enhanceError(error: unknown, filePath?: string): ReplaceError {
  if (error instanceof ReplaceError) {
    return error;
  }

  const originalError = toError(error);
  const systemCode = getErrorCode(originalError);

  // 字符串过长或内存不足
  if (originalError instanceof RangeError || systemCode === "ENOMEM") {
    return createReplaceError("RESOURCE001", [originalError.message], {
      filePath,
      originalError,
    });
  }

  if (systemCode && OPEN_ERROR_CODES.has(systemCode)) {
    return createReplaceError("FILE001", [filePath ?? originalError.message], {
      filePath,
      originalError,
    });
  }

  if (systemCode === "EPIPE") {
    return createReplaceError("OUTPUT001", [], { originalError });
  }

  return createReplaceError("GENERAL001", [originalError.message], {
    filePath,
    originalError,
  });
}

/**
 * 将 catch 到的任意值转换为 Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
