/**
 * Scope Filter Keywords
 * External HVAC / mechanical insulation only
 */

export const IN_SCOPE_SYSTEM_TYPES = ['duct', 'pipe', 'equipment'] as const;

export const EXCLUDED_KEYWORDS = [
  'duct liner',
  'liner',
  'internal liner',
  'acoustic liner',
  'waste',
  'sanitary',
  'domestic water',
  'plumbing',
  'drain',
  'sewer',
  'fire sprinkler',
  'sprinkler pipe',
  'fire protection pipe',
  'underground',
  'buried',
  'below grade'
] as const;

// Checked against spec text only
export const EXCLUDED_SPEC_NOTES = [
  'internal',
  'acoustic only',
  'sprinkler'
] as const;

export const SCOPE_EXCLUSION_DESCRIPTION =
  'duct liner, waste plumbing, domestic water, fire sprinkler, and other non-external mechanical insulation';
