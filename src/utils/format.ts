/**
 * Display helpers shared by the email and chart renderers.
 */

const numberFormat = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/** 12345.678 -> '12,345.68'; null -> 'n/a' */
export function formatAmount(n: number | null): string {
  if (n === null || !Number.isFinite(n)) return "n/a";
  return numberFormat.format(n);
}

/** 5 -> '+5.00%', -1.5 -> '-1.50%'; null -> 'n/a' */
export function formatSignedPct(n: number | null, digits = 2): string {
  if (n === null || !Number.isFinite(n)) return "n/a";
  return `${n >= 0 ? "+" : ""}${n.toFixed(digits)}%`;
}

/** 5 -> '5.00%'; null -> 'n/a' */
export function formatPct(n: number | null, digits = 2): string {
  if (n === null || !Number.isFinite(n)) return "n/a";
  return `${n.toFixed(digits)}%`;
}

export function formatRatio(n: number | null, digits = 2): string {
  if (n === null || !Number.isFinite(n)) return "n/a";
  return n.toFixed(digits);
}

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

/** Escape text for HTML and SVG content or attribute values */
export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}
