/**
 * Compact text for MCP tool results: `[SECTION] key=value` lines and TSV
 * tables, joined into one document capped at a UTF-8 byte budget.
 */

export type CompactField = string | number | boolean | null | undefined;

export const COMPACT_MAX_BYTES = 4000;
export const TRUNCATION_MARKER = '\n...[truncated]';

/** Single-line cell text: tabs become four spaces, line breaks a literal \n */
function cell(value: CompactField): string {
  return value == null ? '' : String(value).replace(/\t/g, '    ').replace(/\r\n?|\n/g, '\\n');
}

export function formatCompactHeader(name: string, fields: Record<string, CompactField> = {}): string {
  let line = `[${name}]`;
  for (const [key, value] of Object.entries(fields)) {
    if (value != null) line += ` ${key}=${cell(value)}`;
  }
  return line;
}

/**
 * TSV table over fixed columns; a missing field is an empty cell
 */
export function formatCompactTable<K extends string>(
  columns: readonly K[],
  records: ReadonlyArray<Partial<Record<K, CompactField>>>
): string {
  const lines = [columns.join('\t')];
  for (const record of records) {
    lines.push(columns.map(column => cell(record[column])).join('\t'));
  }
  return lines.join('\n');
}

/**
 * Join sections line by line. Output over `maxBytes` is cut on a character
 * boundary and ends with TRUNCATION_MARKER.
 */
export function compactDocument(sections: readonly string[], maxBytes = COMPACT_MAX_BYTES): string {
  if (maxBytes <= 0) return '';

  const text = sections.join('\n');
  const bytes = Buffer.from(text, 'utf8');
  if (bytes.length <= maxBytes) return text;

  const room = maxBytes - Buffer.byteLength(TRUNCATION_MARKER, 'utf8');
  if (room <= 0) return TRUNCATION_MARKER.slice(0, maxBytes);

  // 10xxxxxx is a continuation byte
  let end = room;
  while (end > 0 && ((bytes[end] ?? 0) & 0xc0) === 0x80) end--;
  return bytes.toString('utf8', 0, end) + TRUNCATION_MARKER;
}
