import type { CompanyRecord, Snapshot } from '@regwatch/core';

export const DAY1 = new Date(Date.UTC(2025, 9, 17));
export const DAY2 = new Date(Date.UTC(2025, 9, 18));
export const DAY3 = new Date(Date.UTC(2025, 9, 19));

export function company(
  identifier: string,
  overrides: Partial<CompanyRecord> = {}
): CompanyRecord {
  return {
    identifier,
    name: `COMPANY ${identifier}`,
    state: 'Maharashtra',
    status: 'Active',
    authorizedCapital: 100000,
    paidupCapital: 50000,
    address: '1 Test Road, Pune',
    industryClassification: 'Manufacturing',
    snapshotDate: DAY1,
    ...overrides,
  };
}

export function snapshot(
  snapshotDate: Date,
  records: CompanyRecord[],
  source?: string
): Snapshot {
  return {
    snapshotDate,
    source,
    records: records.map((r) => ({ ...r, snapshotDate })),
  };
}
