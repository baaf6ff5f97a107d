import { LogStatus } from './ledger';

export interface RunSummary {
  readonly downloaded: number;
  readonly skipped: number;
  readonly failed: number;
}

export const emptySummary = (): RunSummary => ({ downloaded: 0, skipped: 0, failed: 0 });

export function tally(summary: RunSummary, status: LogStatus): RunSummary {
  switch (status) {
    case 'downloaded':
      return { ...summary, downloaded: summary.downloaded + 1 };
    case 'skipped_exists':
      return { ...summary, skipped: summary.skipped + 1 };
    case 'error':
      return { ...summary, failed: summary.failed + 1 };
  }
}
