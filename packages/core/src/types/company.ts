/**
 * Company registry record and snapshot types
 */

/** One row of a registry snapshot */
export interface CompanyRecord {
  /** Corporate registration number (CIN); unique within a snapshot */
  identifier: string;
  name: string;
  state: string;
  status: string;
  authorizedCapital: number | null;
  paidupCapital: number | null;
  address: string | null;
  industryClassification: string | null;
  /** Date this record was observed */
  snapshotDate: Date;
}

/**
 * Point-in-time record set of all companies.
 * Immutable once loaded.
 */
export interface Snapshot {
  /** Representative observation date, used as the change date */
  snapshotDate: Date;
  records: CompanyRecord[];
  /** File path or label the snapshot was loaded from */
  source?: string;
  /** Rows dropped by a first-wins duplicate policy */
  droppedDuplicates?: number;
}

/** Fields eligible for field-update detection */
export type TrackedField =
  | 'status'
  | 'authorizedCapital'
  | 'paidupCapital'
  | 'name'
  | 'address'
  | 'industryClassification';

/** Tracked fields in comparison order */
export const TRACKED_FIELDS: readonly TrackedField[] = [
  'status',
  'authorizedCapital',
  'paidupCapital',
  'name',
  'address',
  'industryClassification',
];

/** Labels persisted in the change log's field_changed column */
export const TRACKED_FIELD_LABELS: Readonly<Record<TrackedField, string>> = {
  status: 'Status',
  authorizedCapital: 'Authorized_Capital',
  paidupCapital: 'Paidup_Capital',
  name: 'Company_Name',
  address: 'Address',
  industryClassification: 'Industry_Classification',
};
