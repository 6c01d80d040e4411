export type RawOcrEntry = {
  filename: string;
  lines: readonly string[];
};

export const RAW_LOG_HEADER = "=== OCR RAW DATA LOG ===";

export function formatRawOcrLog(entries: readonly RawOcrEntry[]): string {
  let content = `${RAW_LOG_HEADER}\n`;
  for (const entry of entries) {
    content += `\n--- START ${entry.filename} ---\n`;
    for (const line of entry.lines) {
      content += `${line}\n`;
    }
    content += `--- END ${entry.filename} ---\n`;
  }
  return content;
}
