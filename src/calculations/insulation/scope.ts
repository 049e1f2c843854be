/**
 * Scope Filter
 * Drops specs and measurements outside external HVAC / mechanical insulation
 */

import { InsulationSpec, MeasurementItem, SystemType } from '../../types';
import {
  EXCLUDED_KEYWORDS,
  EXCLUDED_SPEC_NOTES,
  IN_SCOPE_SYSTEM_TYPES,
  SCOPE_EXCLUSION_DESCRIPTION
} from '../../constants';

function normalize(value: string | null | undefined): string {
  return (value || '').toLowerCase().trim();
}

function isInScopeType(systemType: SystemType): boolean {
  const inScope: readonly string[] = IN_SCOPE_SYSTEM_TYPES;
  return inScope.includes(systemType);
}

/**
 * First excluded keyword found in the spec's type, size range and requirements
 */
export function specExclusionKeyword(spec: InsulationSpec): string | null {
  const text = normalize(`${spec.system_type} ${spec.size_range} ${spec.special_requirements.join(' ')}`);
  const keywords: readonly string[] = [...EXCLUDED_KEYWORDS, ...EXCLUDED_SPEC_NOTES];
  return keywords.find(keyword => text.includes(keyword)) ?? null;
}

export function measurementExclusionKeyword(measurement: MeasurementItem): string | null {
  const text = normalize(
    `${measurement.system_type} ${measurement.size} ${measurement.location || ''} ${(measurement.notes || []).join(' ')}`
  );
  const keywords: readonly string[] = EXCLUDED_KEYWORDS;
  return keywords.find(keyword => text.includes(keyword)) ?? null;
}

export function filterSpecsToScope(specs: readonly InsulationSpec[]): InsulationSpec[] {
  return specs.filter(spec => isInScopeType(spec.system_type) && specExclusionKeyword(spec) === null);
}

export function filterMeasurementsToScope(measurements: readonly MeasurementItem[]): MeasurementItem[] {
  return measurements.filter(m => isInScopeType(m.system_type) && measurementExclusionKeyword(m) === null);
}

/**
 * One-line summary of what the scope filter removed
 */
export function getScopeExclusionSummary(
  specsBefore: number,
  specsAfter: number,
  measurementsBefore: number,
  measurementsAfter: number
): string {
  const parts: string[] = [];
  if (specsBefore > specsAfter) {
    parts.push(`${specsBefore - specsAfter} specification(s) excluded (out of scope)`);
  }
  if (measurementsBefore > measurementsAfter) {
    parts.push(`${measurementsBefore - measurementsAfter} measurement(s) excluded (out of scope)`);
  }

  if (parts.length === 0) {
    return 'All items fall within scope (external HVAC/mechanical insulation only).';
  }
  return `Scope filter applied: ${parts.join('; ')}. Excluded items: ${SCOPE_EXCLUSION_DESCRIPTION}.`;
}
