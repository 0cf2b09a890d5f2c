/**
 * Organisational Unit Reader
 *
 * Turns the staff directory's flat unit list into one record per unit.
 * The hierarchy is expressed through parentPath: the labels of all
 * ancestors, root first, joined as a collection path.
 */

import { z } from 'zod';
import { joinCollectionPath, type SourceRecord } from '@catalog-sync/core';
import { BaseSourceReader, type SourceReaderConfig } from '../base-source-reader.js';
import type { OdsRecordSource } from '../ods/client.js';

export interface OrgUnitReaderConfig extends SourceReaderConfig {
  client: OdsRecordSource;
  /** Portal dataset holding the unit list */
  datasetId: string;
}

const idSchema = z.union([z.string(), z.number()]).transform((value) => String(value).trim());

export const orgUnitRowSchema = z.object({
  id: idSchema,
  title: z.string().trim().min(1),
  parent_id: idSchema.nullish(),
  url_website: z.string().trim().nullish(),
});

export type OrgUnitRow = z.infer<typeof orgUnitRowSchema>;

export class OrgUnitReader extends BaseSourceReader<OrgUnitReaderConfig> {
  readonly family = 'org-units';

  protected async fetchRecords(): Promise<SourceRecord[]> {
    const rows = await this.config.client.fetchAllRecords(this.config.datasetId, { orderBy: 'id' });
    const units: OrgUnitRow[] = [];

    rows.forEach((row, index) => {
      const parsed = orgUnitRowSchema.safeParse(row);
      if (!parsed.success || !parsed.data.id) {
        const rawId = row.id;
        const key = typeof rawId === 'string' || typeof rawId === 'number' ? String(rawId) : undefined;
        this.skip(key, 'INVALID_RECORD', `Unit row #${index} has no id or title`);
        return;
      }
      units.push(parsed.data);
    });

    return this.buildRecords(units);
  }

  /**
   * Resolve each unit's ancestor chain. Units whose chain hits an unknown
   * parent or loops back on itself are skipped.
   */
  buildRecords(units: readonly OrgUnitRow[]): SourceRecord[] {
    const byId = new Map<string, OrgUnitRow>();
    for (const unit of units) {
      if (!byId.has(unit.id)) byId.set(unit.id, unit);
    }

    const records: SourceRecord[] = [];

    for (const unit of units) {
      const ancestors = this.ancestorLabels(unit, byId);
      if (ancestors === null) continue;

      const fields: SourceRecord['fields'] = { directory_id: unit.id };
      if (unit.url_website) {
        fields.website = unit.url_website;
      }

      records.push({
        key: unit.id,
        label: unit.title,
        fields,
        parentPath: joinCollectionPath(ancestors),
      });
    }

    return records;
  }

  private ancestorLabels(unit: OrgUnitRow, byId: ReadonlyMap<string, OrgUnitRow>): string[] | null {
    const labels: string[] = [];
    const seen = new Set<string>([unit.id]);
    let parentId = unit.parent_id || undefined;

    while (parentId) {
      if (seen.has(parentId)) {
        this.skip(unit.id, 'INVALID_RECORD', `Unit '${unit.id}' is part of a cycle in the unit hierarchy`);
        return null;
      }
      const parent = byId.get(parentId);
      if (!parent) {
        this.skip(unit.id, 'PARENT_NOT_FOUND', `Parent unit '${parentId}' of unit '${unit.id}' not found`);
        return null;
      }
      seen.add(parentId);
      labels.unshift(parent.title);
      parentId = parent.parent_id || undefined;
    }

    return labels;
  }
}

/**
 * Factory function to create an org-unit reader
 */
export function createOrgUnitReader(config: OrgUnitReaderConfig): OrgUnitReader {
  return new OrgUnitReader(config);
}
