/**
 * Report Files - reading timing reports and writing JSON outputs
 */

import { readFile, writeFile, mkdir, stat } from "fs/promises";
import { dirname } from "path";
import type { Stats } from "fs";

/**
 * Raised for input the engine must not be handed: missing files, empty text
 */
export class ReportInputError extends Error {
  constructor(
    message: string,
    public readonly reportPath?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ReportInputError";
  }
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

function unreadable(reportPath: string, error: unknown): ReportInputError {
  if (errorCode(error) === "ENOENT") {
    return new ReportInputError(`Report not found: ${reportPath}`, reportPath, { cause: error });
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new ReportInputError(`Cannot read report: ${reportPath} (${reason})`, reportPath, {
    cause: error,
  });
}

/**
 * Reject empty or whitespace-only report text
 */
export function requireReportText(text: string, reportPath?: string): string {
  if (text.trim().length === 0) {
    throw new ReportInputError(
      reportPath ? `Report is empty: ${reportPath}` : "Report text is empty",
      reportPath
    );
  }
  return text;
}

/**
 * Read a report as UTF-8; invalid byte sequences become U+FFFD
 */
export async function readReportFile(reportPath: string): Promise<string> {
  let info: Stats;
  try {
    info = await stat(reportPath);
  } catch (error) {
    throw unreadable(reportPath, error);
  }
  if (!info.isFile()) {
    throw new ReportInputError(`Not a file: ${reportPath}`, reportPath);
  }

  let buffer: Buffer;
  try {
    buffer = await readFile(reportPath);
  } catch (error) {
    throw unreadable(reportPath, error);
  }
  return requireReportText(buffer.toString("utf-8"), reportPath);
}

/**
 * Report text from either a path or inline text (exactly one)
 */
export async function loadReportText(source: {
  reportPath?: string;
  reportText?: string;
}): Promise<string> {
  const { reportPath, reportText } = source;
  if (reportPath !== undefined && reportText !== undefined) {
    throw new ReportInputError("Provide either a report path or report text, not both");
  }
  if (reportPath !== undefined) {
    return readReportFile(reportPath);
  }
  if (reportText !== undefined) {
    return requireReportText(reportText);
  }
  throw new ReportInputError("A report path or report text is required");
}

/**
 * Write a value as pretty JSON, creating parent directories
 */
export async function writeJson(filePath: string, value: unknown): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, JSON.stringify(value, null, 2) + "\n", "utf-8");
}
