/**
 * Unit & Geometry Helpers
 * Size strings and linear footage to derived quantities
 */

export interface DuctDimensions {
  width: number;
  height: number;
}

const DUCT_SIZE_PATTERN = /^\s*(\d*\.?\d+)\s*(?:"|in(?:ch(?:es)?)?)?\s*[x×]\s*(\d*\.?\d+)/i;
const NUMBER_PATTERN = /\d*\.?\d+/;

/**
 * Parse a rectangular duct size such as "24x20" or "24" × 20"" into inches.
 * Returns null when the string is not two positive numbers.
 */
export function parseDuctDimensions(size: string): DuctDimensions | null {
  const match = DUCT_SIZE_PATTERN.exec(size || '');
  if (!match) return null;

  const width = parseFloat(match[1]);
  const height = parseFloat(match[2]);
  if (!(width > 0) || !(height > 0)) return null;

  return { width, height };
}

/**
 * Formula: (width + height) × 2 / 12
 */
export function ductPerimeterFeet(width: number, height: number): number {
  return (width + height) * 2 / 12;
}

/**
 * Outside surface of a duct run in SF; 0 when the size is unparsable
 */
export function ductSurfaceArea(size: string, lengthFt: number): number {
  const dims = parseDuctDimensions(size);
  if (!dims || !(lengthFt > 0)) return 0;
  return ductPerimeterFeet(dims.width, dims.height) * lengthFt;
}

/**
 * First numeric token of a pipe size: 2", 2 inch, 2" CHW
 */
export function parseSizeToDiameterInches(size: string): number | null {
  const match = NUMBER_PATTERN.exec(size || '');
  if (!match) return null;

  const diameter = parseFloat(match[0]);
  return diameter > 0 ? diameter : null;
}

/**
 * Formula: diameter / 12 × π × length
 */
export function pipeSurfaceArea(diameterInches: number, lengthFt: number): number {
  if (!(diameterInches > 0) || !(lengthFt > 0)) return 0;
  return diameterInches / 12 * Math.PI * lengthFt;
}

/**
 * Σ count × equivalent LF. Kinds other than elbow and tee add nothing.
 */
export function pipeFittingEquivalentLength(
  fittings: Record<string, number> | undefined,
  perElbowLf: number,
  perTeeLf: number
): number {
  return fittingEquivalentLength(fittings, { elbow: perElbowLf, tee: perTeeLf });
}

export function fittingEquivalentLength(
  fittings: Record<string, number> | undefined,
  equivalents: Record<string, number>
): number {
  let total = 0;
  for (const [kind, count] of Object.entries(fittings || {})) {
    const perFitting = equivalents[normalizeFittingKind(kind)];
    if (perFitting === undefined || !(count > 0)) continue;
    total += count * perFitting;
  }
  return total;
}

export function normalizeFittingKind(kind: string): string {
  const key = kind.trim().toLowerCase();
  return key.endsWith('s') ? key.slice(0, -1) : key;
}

/** 1 → "1.0", 1.5 → "1.5", 0.75 → "0.75" */
export function formatThickness(thickness: number): string {
  return Number.isInteger(thickness) ? thickness.toFixed(1) : String(thickness);
}

export function normalizeMaterial(material: string): string {
  return material.trim().toLowerCase().replace(/[\s-]+/g, '_');
}

/**
 * Price book key for an insulation material: "{material}_{thickness}"
 */
export function priceKeyFor(material: string, thickness: number): string {
  return `${normalizeMaterial(material)}_${formatThickness(thickness)}`;
}

export function roundTo(value: number, places: number = 2): number {
  const factor = Math.pow(10, places);
  return Math.round(value * factor) / factor;
}

export function titleCase(value: string): string {
  return value
    .replace(/_/g, ' ')
    .split(' ')
    .filter(Boolean)
    .map(word => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}
