export const RECORD_STATUSES = ['PENDING', 'SUCCESS', 'NOT_FOUND', 'ERROR'] as const;
export type RecordStatus = (typeof RECORD_STATUSES)[number];
export type ResolvedStatus = Exclude<RecordStatus, 'PENDING'>;

/** Literal tokens persisted in the status column. */
export const STATUS_MARKERS: Record<RecordStatus, string> = {
  PENDING: '',
  SUCCESS: 'OK',
  NOT_FOUND: 'NO EXISTE',
  ERROR: 'ERROR',
};

/**
 * Map a persisted marker back to its status. Unknown markers return null
 * so callers can treat them as already handled by someone else.
 */
export function statusFromMarker(marker: string): RecordStatus | null {
  const normalized = marker.trim().toUpperCase();
  for (const status of RECORD_STATUSES) {
    if (STATUS_MARKERS[status] === normalized) return status;
  }
  return null;
}

export interface ContactInfo {
  readonly name: string | null;
  readonly personalEmail: string | null;
  readonly phone: string | null;
  readonly sip: string | null;
  readonly address: string | null;
  readonly department: string | null;
  readonly company: string | null;
  readonly officeLocation: string | null;
}

/** Column order used by the spreadsheet after the email and status columns. */
export const CONTACT_FIELDS = [
  'name',
  'personalEmail',
  'phone',
  'sip',
  'address',
  'department',
  'company',
  'officeLocation',
] as const satisfies readonly (keyof ContactInfo)[];

export type ContactField = (typeof CONTACT_FIELDS)[number];

export interface EmailRecord {
  email: string;
  /** 1-based spreadsheet row the record was read from. */
  rowRef: number;
  status: RecordStatus;
  data?: ContactInfo;
}

export interface BatchResult {
  batchNumber: number;
  total: number;
  successful: number;
  notFound: number;
  errors: number;
  stopped: boolean;
}

export interface ProcessingStats {
  totalBatches: number;
  totalRecords: number;
  successful: number;
  notFound: number;
  errors: number;
  durationMs: number;
  stopped: boolean;
}

export interface Point {
  x: number;
  y: number;
}

export interface Box extends Point {
  width: number;
  height: number;
}

export interface Viewport {
  width: number;
  height: number;
}
