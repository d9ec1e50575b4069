const DASH = "—";

export function fmt(v: number | null | undefined, unit?: string, digits = 2) {
  if (v == null || !Number.isFinite(v)) return DASH;
  const suffix = unit ? ` ${unit}` : "";
  if (unit === "%" || Math.abs(v) >= 1000) return `${Math.round(v)}${suffix}`;
  return `${Number(v.toFixed(digits))}${suffix}`;
}
