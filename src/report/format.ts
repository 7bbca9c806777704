const pad = (n: number, width = 2) => String(n).padStart(width, '0');

/** Calendar date of an instant in UTC, e.g. "2024-03-04". */
export function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** Local wall-clock time, e.g. "2024-03-04 05:06:07". */
export function localDateTime(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/** Local timestamp used in report file names, e.g. "20240304_050607". */
export function fileTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Like `Number#toFixed`, but an exact tie between the two nearest results
 * goes to the even one: 0.125 gives "0.12" and 0.375 gives "0.38".
 */
export function toFixedHalfEven(value: number, digits: number): string {
  // 100 fraction digits is the exact binary value of anything we format
  const [whole, fraction = ''] = Math.abs(value).toFixed(100).split('.');
  const rest = fraction.slice(digits);
  if (!/^50*$/.test(rest)) return value.toFixed(digits);

  const kept = fraction.slice(0, digits);
  const lastDigit = Number((whole + kept).slice(-1));
  if (lastDigit % 2 === 1) return value.toFixed(digits);

  const sign = value < 0 ? '-' : '';
  return sign + (digits > 0 ? `${whole}.${kept}` : whole);
}

export function kbToMb(kb: number): string {
  return toFixedHalfEven(kb / 1024, 2);
}

export function percentage(count: number, total: number): string {
  return toFixedHalfEven(total === 0 ? 0 : (count / total) * 100, 1);
}
