import {
  EnrichmentStatus,
  FailureReason,
  type Identifier,
  type StockDetail,
  type StockRecord,
} from "./types";
import { InvalidTransitionError } from "./errors";

export const UNKNOWN_SEGMENT = "unknown";

export function createRecord(identifier: Identifier, month: number): StockRecord {
  return Object.freeze({
    identifier,
    month,
    segment: UNKNOWN_SEGMENT,
    status: EnrichmentStatus.PENDING,
    detail: null,
    failure: null,
  });
}

function assertPending(record: StockRecord, to: EnrichmentStatus): void {
  if (record.status !== EnrichmentStatus.PENDING) {
    throw new InvalidTransitionError(record.identifier, record.status, to);
  }
}

export function markEnriched(record: StockRecord, detail: StockDetail): StockRecord {
  assertPending(record, EnrichmentStatus.ENRICHED);
  return Object.freeze({
    ...record,
    segment: detail.marketSegment || UNKNOWN_SEGMENT,
    status: EnrichmentStatus.ENRICHED,
    detail: Object.freeze({ ...detail }),
  });
}

export function markFailed(
  record: StockRecord,
  reason: FailureReason,
  message: string
): StockRecord {
  assertPending(record, EnrichmentStatus.FAILED);
  return Object.freeze({
    ...record,
    status: EnrichmentStatus.FAILED,
    failure: Object.freeze({ reason, message }),
  });
}
