const XML_ENTITIES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

export function escapeXml(value: string): string {
  return value.replace(/[&<>"']/g, char => XML_ENTITIES[char] ?? char);
}

/**
 * RFC 4180 field: quoted when it holds a delimiter, quote or line break
 */
export function escapeCsv(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function toCsvLine(fields: string[]): string {
  return fields.map(escapeCsv).join(',');
}
