import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { HeuristicFieldExtractor } from "../processor/heuristic-extractor.js";
import {
  recordFilenameFor,
  scanDirectory,
  splitOcrDump,
  writeScanExports,
} from "./directory-scanner.js";

let workDir = "";

beforeEach(async () => {
  workDir = await mkdtemp(path.join(os.tmpdir(), "receipt-scan-"));
});

afterEach(async () => {
  await rm(workDir, { recursive: true, force: true });
});

function createLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const extractor = new HeuristicFieldExtractor({ now: () => new Date(2024, 0, 15) });

describe("splitOcrDump", () => {
  it("splits on any newline and drops the trailing empty line", () => {
    expect(splitOcrDump("A\r\nB\n")).toEqual(["A", "B"]);
    expect(splitOcrDump("A\n\nB")).toEqual(["A", "", "B"]);
    expect(splitOcrDump("")).toEqual([]);
  });
});

describe("recordFilenameFor", () => {
  it("strips the dump extension", () => {
    expect(recordFilenameFor("scontrino.jpg.txt")).toBe("scontrino.jpg");
    expect(recordFilenameFor("scontrino.jpg.TXT")).toBe("scontrino.jpg");
    expect(recordFilenameFor("scontrino.jpg")).toBe("scontrino.jpg");
  });
});

describe("scanDirectory", () => {
  it("extracts one record per dump in file-name order", async () => {
    await writeFile(
      path.join(workDir, "b.jpg.txt"),
      "ACME S.P.A\nVIA ROMA 10\n20100 MILANO (MI)\n23/05/23\nTOTALE\n12,50\n",
    );
    await writeFile(path.join(workDir, "a.jpg.txt"), "");
    await writeFile(path.join(workDir, "notes.md"), "not a dump");
    const logger = createLogger();

    const result = await scanDirectory(workDir, { extractor, logger });

    expect(result.records).toEqual([
      {
        filename: "a.jpg",
        vendor: null,
        location: null,
        date: null,
        total: null,
        currency: null,
      },
      {
        filename: "b.jpg",
        vendor: "ACME S.P.A",
        location: "VIA ROMA 10 20100 MILANO (MI)",
        date: "23/05/2023",
        total: "12.50",
        currency: "EUR",
      },
    ]);
    expect(result.rawEntries.map((entry) => entry.filename)).toEqual(["a.jpg", "b.jpg"]);
    expect(result.skipped).toEqual([]);
    expect(logger.info).toHaveBeenNthCalledWith(1, "[receipt-scan] processing a.jpg (1/2)");
    expect(logger.info).toHaveBeenNthCalledWith(2, "[receipt-scan] processing b.jpg (2/2)");
  });

  it("writes the csv and raw log", async () => {
    await writeFile(path.join(workDir, "a.jpg.txt"), "BAR CENTRALE\nTOTALE 2,00\n");
    const result = await scanDirectory(workDir, { extractor, logger: createLogger() });
    const csvPath = path.join(workDir, "out.csv");
    const rawLogPath = path.join(workDir, "raw.txt");

    await writeScanExports(result, { csvPath, rawLogPath });

    expect(await readFile(csvPath, "utf8")).toBe(
      [
        "filename,vendor,location,date,total,currency",
        "a.jpg,BAR CENTRALE,null,(15/01/2024),2.00,EUR",
        ",,,,,",
        ",TOTALE EUR,,,2.00,EUR",
        "",
      ].join("\n"),
    );
    expect(await readFile(rawLogPath, "utf8")).toBe(
      [
        "=== OCR RAW DATA LOG ===",
        "",
        "--- START a.jpg ---",
        "BAR CENTRALE",
        "TOTALE 2,00",
        "--- END a.jpg ---",
        "",
      ].join("\n"),
    );
  });
});
