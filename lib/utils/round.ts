// Rounds to `digits` decimals, ties to even, judged on the exact binary value
// (12.25 -> 12.2, 2.675 -> 2.67 since 2.675 is stored just below the tie).
export function roundHalfEven(value: number, digits: number): number {
  if (!Number.isFinite(value)) return value;
  // toFixed is exact on non-ties and goes away from zero on exact ties
  const away = Number(value.toFixed(digits));
  const fraction = Math.abs(value).toFixed(100).split(".")[1] ?? "";
  if (!/^50*$/.test(fraction.slice(digits))) return away;

  const scale = 10 ** digits;
  if (Math.round(Math.abs(away) * scale) % 2 === 0) return away;
  return Number((away - Math.sign(value) / scale).toFixed(digits));
}
