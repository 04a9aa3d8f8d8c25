import { load, type YAMLException } from "js-yaml";

import { toErrorMessage } from "../../utils/errors.js";

export interface YamlParseErrorDetail {
  reason?: string;
  message?: string;
  line?: number;
  column?: number;
}

export interface ParseYamlDocumentOptions<TError extends Error> {
  emptyValue?: unknown;
  formatError: (detail: YamlParseErrorDetail) => TError;
}

export function isYamlException(error: unknown): error is YAMLException {
  return error instanceof Error && error.name === "YAMLException";
}

export function parseYamlDocument<TError extends Error>(
  content: string,
  options: ParseYamlDocumentOptions<TError>,
): unknown {
  const { emptyValue = {}, formatError } = options;
  const source = content.trim();
  if (source.length === 0) {
    return emptyValue;
  }

  try {
    return load(source) ?? emptyValue;
  } catch (error) {
    throw formatError(buildYamlParseErrorDetail(error));
  }
}

function buildYamlParseErrorDetail(error: unknown): YamlParseErrorDetail {
  if (!isYamlException(error)) {
    return { message: toErrorMessage(error) };
  }
  const { reason, message, mark } = error;
  return {
    reason: reason || undefined,
    message,
    line:
      typeof mark?.line === "number" && Number.isFinite(mark.line)
        ? mark.line + 1
        : undefined,
    column:
      typeof mark?.column === "number" && Number.isFinite(mark.column)
        ? mark.column + 1
        : undefined,
  };
}

/**
 * Formats the detail of a YAML parse error:
 * - With location: `(line X, column Y): message`
 * - Without location: `message`
 */
export function formatYamlErrorDetail(detail: YamlParseErrorDetail): string {
  const message = detail.reason ?? detail.message ?? "unknown error";
  if (typeof detail.line === "number" && typeof detail.column === "number") {
    return `(line ${detail.line}, column ${detail.column}): ${message}`;
  }
  return message;
}
