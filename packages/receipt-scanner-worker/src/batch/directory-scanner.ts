import type { ReceiptRecord } from "@receipt-scanner/contracts";
import { readdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { toCsv } from "../export/csv.js";
import { formatRawOcrLog, type RawOcrEntry } from "../export/raw-log.js";
import { buildExportRows } from "../processor/aggregation.js";
import type { ReceiptFieldExtractor } from "../processor/types.js";
import { toReceiptRecord } from "../processor/normalization.js";
import type { WorkerRunnerLogger } from "../runner/worker-runner.js";

const OCR_DUMP_EXTENSION = ".txt";

export type DirectoryScanResult = {
  records: ReceiptRecord[];
  rawEntries: RawOcrEntry[];
  skipped: string[];
};

export type DirectoryScanOptions = {
  extractor: ReceiptFieldExtractor;
  logger: WorkerRunnerLogger;
};

export function splitOcrDump(content: string): string[] {
  const lines = content.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

export function recordFilenameFor(dumpName: string): string {
  return dumpName.toLowerCase().endsWith(OCR_DUMP_EXTENSION)
    ? dumpName.slice(0, -OCR_DUMP_EXTENSION.length)
    : dumpName;
}

/**
 * Extracts one record per OCR dump in `directory`, in file-name order. Unreadable dumps are
 * logged and skipped so the rest of the batch still completes.
 */
export async function scanDirectory(
  directory: string,
  options: DirectoryScanOptions,
): Promise<DirectoryScanResult> {
  const entries = await readdir(directory, { withFileTypes: true });
  const dumps = entries
    .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith(OCR_DUMP_EXTENSION))
    .map((entry) => entry.name)
    .sort();

  const result: DirectoryScanResult = { records: [], rawEntries: [], skipped: [] };

  for (const [index, dumpName] of dumps.entries()) {
    const filename = recordFilenameFor(dumpName);
    options.logger.info(`[receipt-scan] processing ${filename} (${index + 1}/${dumps.length})`);

    let lines: string[];
    try {
      lines = splitOcrDump(await readFile(path.join(directory, dumpName), "utf8"));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      options.logger.error(`[receipt-scan] could not read ${dumpName}: ${message}`);
      result.skipped.push(dumpName);
      continue;
    }

    const record = toReceiptRecord(filename || dumpName, options.extractor.extract({ lines }));
    result.records.push(record);
    result.rawEntries.push({ filename, lines });
  }

  return result;
}

export async function writeScanExports(
  result: DirectoryScanResult,
  outputs: { csvPath: string; rawLogPath: string },
): Promise<void> {
  await writeFile(outputs.csvPath, toCsv(buildExportRows(result.records)), "utf8");
  await writeFile(outputs.rawLogPath, formatRawOcrLog(result.rawEntries), "utf8");
}
