import path from "node:path";
import { parseArgs } from "node:util";
import { scanDirectory, writeScanExports } from "./batch/directory-scanner.js";
import { HeuristicFieldExtractor } from "./processor/heuristic-extractor.js";
import { resolveExtractionOptionsFromEnv } from "./processor/receipt-processor.js";
import { consoleLogger } from "./runner/worker-runner.js";

const USAGE = "usage: receipt-scan <ocr-dump-dir> [--out receipts_data.csv] [--raw ocr_raw_data.txt]";

async function main() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      out: { type: "string" },
      raw: { type: "string" },
    },
  });

  const csvPath = values.out ?? "receipts_data.csv";
  const rawLogPath = values.raw ?? "ocr_raw_data.txt";
  const directory = positionals[0];
  if (!directory) {
    consoleLogger.error(USAGE);
    process.exitCode = 2;
    return;
  }

  const result = await scanDirectory(path.resolve(directory), {
    extractor: new HeuristicFieldExtractor(resolveExtractionOptionsFromEnv()),
    logger: consoleLogger,
  });

  if (result.records.length === 0) {
    consoleLogger.warn(`[receipt-scan] no OCR dumps found in ${directory}`);
    return;
  }

  await writeScanExports(result, { csvPath, rawLogPath });
  consoleLogger.info(
    `[receipt-scan] saved ${result.records.length} receipts to ${csvPath} (raw OCR in ${rawLogPath})`,
  );
}

main().catch((error: unknown) => {
  consoleLogger.error(`[receipt-scan] ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
});
