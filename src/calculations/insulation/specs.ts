/**
 * Specification Matching
 * Decides which InsulationSpec governs a measurement
 */

import { EstimateWarning, InsulationSpec, MeasurementItem } from '../../types';
import { DEFAULT_SPECS } from '../../constants';
import { parseDuctDimensions, parseSizeToDiameterInches } from './geometry';

export interface SpecMatcher {
  readonly name: string;
  findApplicableSpec(
    measurement: MeasurementItem,
    specs: readonly InsulationSpec[]
  ): InsulationSpec | null;
}

/**
 * First spec (in input order) with the measurement's system type.
 * size_range is ignored, so overlapping specs for one system type
 * (indoor vs outdoor duct, say) always resolve to the first listed.
 */
export const firstSystemTypeMatcher: SpecMatcher = {
  name: 'first-system-type',
  findApplicableSpec(measurement, specs) {
    return specs.find(spec => spec.system_type === measurement.system_type) || null;
  }
};

export interface SizeRange {
  min: number;
  max: number;
}

/**
 * "1-2 inch" → 1..2, "up to 2"" → 0..2, "14" and larger" → 14..∞.
 * Returns null for "all", blank, or text without numbers.
 */
export function parseSizeRange(sizeRange: string): SizeRange | null {
  const text = (sizeRange || '').toLowerCase();
  const numbers = (text.match(/\d*\.?\d+/g) || []).map(Number);
  if (numbers.length === 0) return null;

  if (numbers.length >= 2) {
    return { min: Math.min(numbers[0], numbers[1]), max: Math.max(numbers[0], numbers[1]) };
  }

  const value = numbers[0];
  if (/up to|under|below|less|max|<|≤/.test(text)) {
    return { min: 0, max: value };
  }
  if (/larger|above|over|greater|more|min|\+|>|≥/.test(text)) {
    return { min: value, max: Number.POSITIVE_INFINITY };
  }
  return { min: value, max: value };
}

/**
 * Nominal size in inches: pipe diameter, or the larger duct side
 */
export function nominalSizeInches(measurement: MeasurementItem): number | null {
  if (measurement.system_type === 'duct' || measurement.system_type === 'equipment') {
    const dims = parseDuctDimensions(measurement.size);
    if (dims) return Math.max(dims.width, dims.height);
  }
  return parseSizeToDiameterInches(measurement.size);
}

/**
 * Prefers the first spec whose size_range contains the measurement's nominal size,
 * then the first open-ended ("all") spec, then the first system-type match.
 */
export const sizeRangeMatcher: SpecMatcher = {
  name: 'size-range',
  findApplicableSpec(measurement, specs) {
    const candidates = specs.filter(spec => spec.system_type === measurement.system_type);
    if (candidates.length === 0) return null;

    const nominal = nominalSizeInches(measurement);
    if (nominal !== null) {
      const inRange = candidates.find(spec => {
        const range = parseSizeRange(spec.size_range);
        return range !== null && nominal >= range.min && nominal <= range.max;
      });
      if (inRange) return inRange;
    }

    const openEnded = candidates.find(spec => parseSizeRange(spec.size_range) === null);
    return openEnded || candidates[0];
  }
};

export const SPEC_MATCHERS: Record<string, SpecMatcher> = {
  [firstSystemTypeMatcher.name]: firstSystemTypeMatcher,
  [sizeRangeMatcher.name]: sizeRangeMatcher
};

/**
 * Substitute the default duct and pipe specs when none were supplied
 */
export function resolveSpecifications(
  specs: readonly InsulationSpec[] | null | undefined
): { specs: InsulationSpec[]; warnings: EstimateWarning[] } {
  if (specs && specs.length > 0) {
    return { specs: [...specs], warnings: [] };
  }

  return {
    specs: DEFAULT_SPECS.map(spec => ({ ...spec, special_requirements: [...spec.special_requirements] })),
    warnings: [{
      code: 'DEFAULT_SPECS_USED',
      message: 'No specifications supplied; using default 1.5" fiberglass/FSK duct and 1.0" elastomeric pipe specs',
      field: 'specifications'
    }]
  };
}

export function hasRequirement(spec: InsulationSpec, requirement: string): boolean {
  return spec.special_requirements.some(r => r.trim().toLowerCase() === requirement);
}
