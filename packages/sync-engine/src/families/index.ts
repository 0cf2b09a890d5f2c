import { SyncError } from '@catalog-sync/core';
import type { EntityProfile } from './entity-profile.js';
import { orgUnitProfile } from './org-units.js';
import { datasetCompositionProfile } from './dataset-compositions.js';
import { legalReferenceProfile } from './legal-references.js';
import { datasetProfile } from './datasets.js';

export type { EntityProfile, ChildProfile } from './entity-profile.js';
export { orgUnitProfile } from './org-units.js';
export { datasetCompositionProfile, datatypeFor, DATATYPE_BY_COLUMN_TYPE } from './dataset-compositions.js';
export { legalReferenceProfile } from './legal-references.js';
export { datasetProfile } from './datasets.js';

export const ENTITY_FAMILIES = ['org-units', 'datasets', 'dataset-compositions', 'legal-references'] as const;

export type EntityFamily = (typeof ENTITY_FAMILIES)[number];

export const ENTITY_PROFILES: Readonly<Record<EntityFamily, EntityProfile>> = {
  'org-units': orgUnitProfile,
  datasets: datasetProfile,
  'dataset-compositions': datasetCompositionProfile,
  'legal-references': legalReferenceProfile,
};

export function getEntityProfile(family: string): EntityProfile {
  const known = ENTITY_FAMILIES.find((name) => name === family);
  if (!known) {
    throw new SyncError({
      code: 'CONFIGURATION_ERROR',
      message: `Unknown entity family '${family}'`,
      suggestion: `Use one of: ${ENTITY_FAMILIES.join(', ')}`,
    });
  }
  return ENTITY_PROFILES[known];
}
