/**
 * Severity policy for region disease advisories.
 *
 * A disease whose name mentions "threshold" is reported as critical, every
 * other disease as a warning. The rule keys off naming rather than any
 * property of the disease definition; keep it here so rule evaluation does
 * not depend on it directly.
 */

import { AdvisoryLevel } from '../types/core';
import { AdvisoryPriority } from '../types/advisory';

export function diseaseAdvisoryLevel(diseaseName: string): AdvisoryLevel {
  return diseaseName.toLowerCase().includes('threshold') ? AdvisoryLevel.CRITICAL : AdvisoryLevel.WARNING;
}

export function priorityForLevel(level: AdvisoryLevel): AdvisoryPriority {
  return level === AdvisoryLevel.CRITICAL ? 1 : 2;
}
