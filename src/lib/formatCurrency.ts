/**
 * Currency presentation for reports: "AUD 12,999,035,439.48".
 * Currency code is prefixed by hand; digits use en-AU grouping.
 */

const AUD_NUMBER = new Intl.NumberFormat("en-AU", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export function formatAud(value: number): string {
  return `AUD ${AUD_NUMBER.format(value)}`;
}

/** 0.1 → "10%", 0.125 → "12.5%". */
export function formatPercent(fraction: number): string {
  return `${Number((fraction * 100).toFixed(1))}%`;
}
