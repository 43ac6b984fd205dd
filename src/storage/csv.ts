/**
 * Minimal RFC 4180 CSV serialization
 */

function escapeField(value: string | number): string {
  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replaceAll('"', '""')}"`;
  }
  return text;
}

export function toCsv<T, K extends keyof T & string>(
  rows: readonly T[],
  columns: readonly K[],
  format: (value: T[K]) => string | number = (value) => (typeof value === 'number' ? value : String(value ?? ''))
): string {
  const lines = [columns.map((column) => escapeField(column)).join(',')];
  for (const row of rows) {
    lines.push(columns.map((column) => escapeField(format(row[column]))).join(','));
  }
  return lines.join('\n') + '\n';
}
