const usdFormatter = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

// 35000000000 -> "35,000,000,000.00"
export function formatUsd(amount: number): string {
  return usdFormatter.format(amount);
}

export function formatPercent(value: number): string {
  return `${value.toFixed(2)}%`;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

// "2024-03-01 12:00:00 UTC"
export function formatUtc(date: Date): string {
  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())} UTC`
  );
}

export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;
