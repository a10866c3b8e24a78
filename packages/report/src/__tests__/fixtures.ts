/**
 * Meter export fixtures for report tests
 */

export interface ExportRowOptions {
  value?: number;
  /** First reading, HH:MM */
  start?: string;
  method?: string;
  comment?: string;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * CSV rows for one day, one reading every 15 minutes
 */
export function exportRows(date: string, count: number, options: ExportRowOptions = {}): string[] {
  const { value = 6, start = "00:00", method = "CGM", comment = "" } = options;
  const [hours, minutes] = start.split(":").map(Number);
  const rows: string[] = [];
  for (let i = 0; i < count; i++) {
    const total = hours * 60 + minutes + i * 15;
    const time = `${pad(Math.floor(total / 60))}:${pad(total % 60)}:00`;
    rows.push(`"${date} ${time}","${value}","","${method}","${comment}"`);
  }
  return rows;
}

export function exportCsv(...groups: string[][]): string {
  return groups.flat().join("\n") + "\n";
}
