// ---------------------------------------------------------------------------
// Download helpers: Content-Disposition and CSV
// ---------------------------------------------------------------------------

/** RFC 5987 ext-value: percent-encode everything outside attr-char. */
function encodeExtValue(value: string): string {
  return encodeURIComponent(value).replace(
    /['()*]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`,
  );
}

/**
 * `attachment` header value. Node rejects header bytes above 0xFF, so the
 * plain `filename` is reduced to ASCII and the exact name travels in
 * `filename*`.
 */
export function contentDisposition(filename: string): string {
  const fallback = filename.replace(/[^A-Za-z0-9._-]/g, '_');
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encodeExtValue(filename)}`;
}

export interface CsvExport {
  filename: string;
  csv: string;
  rowCount: number;
}

export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/** Header row plus one line per row, newline-terminated. */
export function buildCsv(
  headers: readonly string[],
  rows: ReadonlyArray<ReadonlyArray<string | number>>,
): string {
  const lines = [headers, ...rows].map((row) =>
    row.map((field) => escapeCsvField(String(field))).join(','),
  );
  return lines.join('\n') + '\n';
}
