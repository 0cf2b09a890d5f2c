/**
 * Field value types shared by source records and catalog assets
 */

/** JSON-like value carried by a source record or an asset field */
export type FieldValue =
  | string
  | number
  | boolean
  | null
  | FieldValue[]
  | { [key: string]: FieldValue };

/** Named field values of a record, child item or asset */
export type FieldMap = { [field: string]: FieldValue };
