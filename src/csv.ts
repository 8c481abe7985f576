import type { Measurement } from "./types.js";

export const CSV_DELIMITER = ";";
export const CSV_HEADERS = ["city", "location", "parameter", "value", "unit", "timestamp"] as const;

export interface CsvFile {
  content: Buffer;
  filename: string;
}

function escapeField(field: string): string {
  if (/[;"\r\n]/.test(field)) {
    return `"${field.replace(/"/g, '""')}"`;
  }
  return field;
}

function toRow(fields: readonly string[]): string {
  return fields.map(escapeField).join(CSV_DELIMITER);
}

/**
 * Serialize measurements to a `;`-delimited UTF-8 CSV. The warehouse load
 * skips exactly one header row and expects this column order.
 */
export function generateCsv(measurements: Measurement[], now: Date = new Date()): CsvFile {
  const lines = [toRow(CSV_HEADERS)];
  for (const m of measurements) {
    lines.push(
      toRow([m.city, m.location, m.parameter, String(m.value), m.unit, m.timestamp.toISOString()])
    );
  }

  return {
    content: Buffer.from(lines.join("\r\n") + "\r\n", "utf-8"),
    filename: `air_quality_${now.toISOString()}.csv`,
  };
}
