import { MM_PER_CM, MM_PER_INCH } from '@/constants/app';
import type { Milli } from '@/types/wardrobe';

export function mmToInches(mm: Milli): number {
  return mm / MM_PER_INCH;
}

export function inchesToMm(inches: number): Milli {
  return inches * MM_PER_INCH;
}

export function mmToCm(mm: Milli): number {
  return mm / MM_PER_CM;
}

export function cmToMm(cm: number): Milli {
  return cm * MM_PER_CM;
}

/**
 * Formate une dimension pour l'affichage.
 * - métrique : "600.0 mm"
 * - impérial : "23.6\"" (pouces)
 */
export function formatDimension(mm: Milli, metric = true, precision = 1): string {
  if (metric) return `${mm.toFixed(precision)} mm`;
  return `${mmToInches(mm).toFixed(precision)}"`;
}

// Nombre décimal simple, exposant optionnel ("500", "-2.5", ".5", "1e3")
const NUMERIC = /^[+-]?(\d+(\.\d*)?|\.\d+)(e[+-]?\d+)?$/;

function parseNumber(text: string): number | null {
  const t = text.trim();
  if (!NUMERIC.test(t)) return null;
  return Number(t);
}

/**
 * Parse a user-typed dimension into millimetres.
 * Accepts "500", "500mm", "50cm", "20\"" and "20in"; no suffix means millimetres.
 */
export function parseDimension(text: string): { mm: Milli; ok: boolean } {
  const value = text.trim().toLowerCase();

  let payload = value;
  let toMm = (n: number): Milli => n;
  if (value.endsWith('mm')) {
    payload = value.slice(0, -2);
  } else if (value.endsWith('cm')) {
    payload = value.slice(0, -2);
    toMm = cmToMm;
  } else if (value.endsWith('"')) {
    payload = value.slice(0, -1);
    toMm = inchesToMm;
  } else if (value.endsWith('in')) {
    payload = value.slice(0, -2);
    toMm = inchesToMm;
  }

  const n = parseNumber(payload);
  if (n === null) return { mm: 0, ok: false };
  return { mm: toMm(n), ok: true };
}
