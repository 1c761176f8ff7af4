/** A decoded JSON object from one of the session's event files. No fixed schema. */
export type RawRecord = Record<string, unknown>;

/** Where a raw record was read from; only consulted as a last-resort step id. */
export interface RecordOrigin {
  source: string;
  index: number;
}

export interface SourcedRecord {
  record: RawRecord;
  origin?: RecordOrigin;
}

export interface Event {
  step: string;
  role: string;
  content: string;
  timestamp: Date;
  status?: string;
  metadata: Record<string, unknown>;
}
