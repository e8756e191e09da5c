/** `"118,119"` or `"113-116"` (mixable) → congress numbers; unparseable parts are dropped. */
export function parseCongresses(value: string): number[] {
  return value
    .split(',')
    .map(part => part.trim())
    .flatMap(part => {
      const range = /^(\d+)-(\d+)$/.exec(part);
      if (range?.[1] && range[2]) {
        const from = parseInt(range[1], 10);
        const to = parseInt(range[2], 10);
        return Array.from({ length: Math.max(0, to - from + 1) }, (_, i) => from + i);
      }
      const n = parseInt(part, 10);
      return Number.isFinite(n) ? [n] : [];
    });
}

/** Whole number ≥ 1, or null for anything else ("abc", "0", "2.5", ""). */
export function parsePositiveInt(value: string): number | null {
  const n = Number(value.trim());
  return value.trim() !== '' && Number.isInteger(n) && n >= 1 ? n : null;
}
