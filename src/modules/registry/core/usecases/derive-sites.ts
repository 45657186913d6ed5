import type { ReactorUnit, Site } from '../types.js';

export const siteKey = (unit: ReactorUnit): string =>
  `${String(unit.coordinates.latitude)},${String(unit.coordinates.longitude)}`;

/**
 * Groups units by exact coordinate pair. Sites keep the order in which their first
 * unit appears; units keep registry order within a site.
 */
export const deriveSites = (units: readonly ReactorUnit[]): Site[] => {
  const sites = new Map<string, Site>();

  for (const unit of units) {
    const key = siteKey(unit);
    const capacity = unit.capacity.electricalMwe ?? 0;
    const existing = sites.get(key);

    if (existing === undefined) {
      sites.set(key, {
        key,
        coordinates: { ...unit.coordinates },
        unitNames: [unit.name],
        unitCount: 1,
        totalCapacityMwe: capacity,
        isMultiUnit: false,
      });
      continue;
    }

    existing.unitNames.push(unit.name);
    existing.unitCount += 1;
    existing.totalCapacityMwe += capacity;
    existing.isMultiUnit = true;
  }

  return [...sites.values()];
};
