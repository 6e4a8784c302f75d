/**
 * Change event types shared by the detector, the stores and the reporting layer
 */

/** Category of a detected change, as persisted */
export type ChangeType = 'New Incorporation' | 'Deregistration' | 'Field Update';

export const CHANGE_TYPES: readonly ChangeType[] = [
  'New Incorporation',
  'Deregistration',
  'Field Update',
];

/** field_changed value for whole-record events */
export const ALL_FIELDS = 'All';

/** Status recorded for companies missing from the newer snapshot */
export const DEREGISTERED_STATUS = 'Deregistered';

/** One detected delta between two snapshots for one identifier */
export interface ChangeEvent {
  identifier: string;
  changeType: ChangeType;
  /** "All" for whole-record events, otherwise a tracked field label */
  fieldChanged: string;
  oldValue: string;
  newValue: string;
  /** Change timestamp supplied by the caller */
  date: Date;
  companyName: string;
  state: string;
  status: string;
}

/** A change event as read back from a store */
export interface StoredChangeEvent extends ChangeEvent {
  /** Store-assigned surrogate key */
  id: string;
  /** Insertion timestamp */
  createdAt: Date;
}
