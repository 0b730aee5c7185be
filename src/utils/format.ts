const SI_UNITS = ['B', 'kB', 'MB', 'GB', 'TB', 'PB', 'EB'];

/**
 * Human readable byte count in SI units, e.g. `999 B`, `1.2 MB`, `83 MB`.
 * One decimal is kept while the scaled value is below 10.
 */
export function formatBytes(bytes: number): string {
  if (bytes < 10) {
    return `${Math.floor(bytes)} B`;
  }

  let exponent = 0;
  while (exponent < SI_UNITS.length - 1 && bytes >= Math.pow(1000, exponent + 1)) {
    exponent++;
  }
  const value = Math.floor((bytes / Math.pow(1000, exponent)) * 10 + 0.5) / 10;
  return `${value.toFixed(value < 10 ? 1 : 0)} ${SI_UNITS[exponent]}`;
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}
