const GIB = 1024 ** 3;

/** Formats whole seconds as "1d 2h 3m 4s", dropping the day part when zero. */
export function formatUptime(totalSeconds: number): string {
  let rest = Math.max(0, Math.floor(totalSeconds));
  const days = Math.floor(rest / 86400);
  rest %= 86400;
  const hours = Math.floor(rest / 3600);
  rest %= 3600;
  const minutes = Math.floor(rest / 60);
  const seconds = rest % 60;

  const hms = `${hours}h ${minutes}m ${seconds}s`;
  return days > 0 ? `${days}d ${hms}` : hms;
}

/** Bytes to GiB with two decimals, e.g. 2147483648 -> "2.00". */
export function toGiB(bytes: number): string {
  return (bytes / GIB).toFixed(2);
}

/**
 * Prints a number with at least one fractional digit: 25 -> "25.0",
 * 33.3 -> "33.3".
 */
export function formatDecimal(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

/**
 * Rounds to `digits` decimals on the exact binary value, sending exact halves
 * to the even neighbour: 12.25 -> 12.2, 12.35 (stored as 12.3499...) -> 12.3.
 */
export function roundTo(value: number, digits: number): number {
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) return value;

  // toFixed works on the exact value but breaks ties away from zero.
  const expansion = value.toFixed(100);
  const cut = expansion.indexOf(".") + 1 + digits;
  const isTie = /^50*$/.test(expansion.slice(cut));
  if (!isTie) return Number(value.toFixed(digits));

  const truncated = expansion.slice(0, digits > 0 ? cut : cut - 1);
  const lastDigit = Number(truncated[truncated.length - 1]);
  return lastDigit % 2 === 0 ? Number(truncated) : Number(value.toFixed(digits));
}

export function formatUsage(usedBytes: number, totalBytes: number): string {
  return `${toGiB(usedBytes)}/${toGiB(totalBytes)} Go`;
}
