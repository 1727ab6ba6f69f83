import { RunSummary, TransferOutcome, TransferStatus } from '../types';

export function emptySummary(): RunSummary {
  return { selected: 0, succeeded: 0, skipped: 0, failed: [], bytesWritten: 0 };
}

export function foldOutcome(summary: RunSummary, outcome: TransferOutcome): RunSummary {
  const { record } = outcome;
  const next: RunSummary = {
    ...summary,
    selected: summary.selected + 1,
    bytesWritten: summary.bytesWritten + outcome.bytesWritten,
    lastCursor: { catalogIndex: record.catalogIndex, position: record.position },
  };

  switch (outcome.status) {
    case TransferStatus.SUCCESS:
      next.succeeded = summary.succeeded + 1;
      break;
    case TransferStatus.SKIPPED:
      next.skipped = summary.skipped + 1;
      break;
    case TransferStatus.FAILED:
      next.failed = [
        ...summary.failed,
        {
          globalSequence: record.globalSequence,
          id: record.id,
          title: record.title,
          reason: outcome.errorDetail ?? 'Unknown error',
        },
      ];
      break;
  }

  return next;
}

/** Flags that continue a walk right after the last processed record. */
export function resumeHint(summary: RunSummary): string | null {
  if (!summary.lastCursor) return null;
  return `--table ${summary.lastCursor.catalogIndex} --item ${summary.lastCursor.position + 1}`;
}
