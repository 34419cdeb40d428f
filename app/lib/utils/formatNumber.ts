/**
 * Format a number to at most 4 significant figures, using k/M/B suffixes instead of scientific notation
 */
export function formatSigFigs(value: number, maxSigFigs: number = 4): string {
  if (value === 0 || !isFinite(value)) return "0";

  const sigFigs = Math.max(1, maxSigFigs);
  const absValue = Math.abs(value);
  const sign = value < 0 ? "-" : "";

  if (absValue >= 1_000_000_000) {
    return sign + withSigFigs(absValue / 1_000_000_000, sigFigs) + "B";
  } else if (absValue >= 1_000_000) {
    return sign + withSigFigs(absValue / 1_000_000, sigFigs) + "M";
  } else if (absValue >= 1_000) {
    return sign + withSigFigs(absValue / 1_000, sigFigs) + "k";
  } else if (absValue < 0.0001) {
    return "0";
  }
  return sign + withSigFigs(absValue, sigFigs);
}

function withSigFigs(value: number, sigFigs: number): string {
  let formatted = value.toPrecision(sigFigs);

  // toPrecision switches to exponent form for large magnitudes
  if (formatted.includes("e") || formatted.includes("E")) {
    const num = parseFloat(formatted);
    const decimals = Math.max(0, sigFigs - Math.floor(Math.log10(Math.abs(num))) - 1);
    formatted = num.toFixed(Math.min(decimals, 4));
  }

  // Trailing zeros only after a decimal point
  return formatted.includes(".") ? formatted.replace(/\.?0+$/, "") : formatted;
}

export function formatWh(wh: number): string {
  return `${formatSigFigs(wh)} Wh`;
}

/** Seconds → "12.5 h" */
export function formatHours(seconds: number): string {
  return `${formatSigFigs(seconds / 3600, 3)} h`;
}

/** Fractional hour of day → "HH:MM" */
export function formatTimeOfDay(hour: number): string {
  const totalMinutes = Math.floor((((hour % 24) + 24) % 24) * 60);
  const h = Math.floor(totalMinutes / 60);
  const m = totalMinutes % 60;
  return `${String(h).padStart(2, "0")}:${String(m).padStart(2, "0")}`;
}
