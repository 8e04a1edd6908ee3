import type { DeviceScanOutcome, ScanReport } from './services/ScanService.js';

function describeOutcome(outcome: DeviceScanOutcome): string {
  switch (outcome.status) {
    case 'committed': {
      const state = outcome.requestId
        ? `approval requested (${outcome.requestId})`
        : outcome.paused
          ? 'awaiting approval'
          : 'counting';
      return `${outcome.deviceId}: tier ${outcome.tier}, +${outcome.newFiles} new, count ${outcome.countSinceThreshold}, ${state}`;
    }
    case 'failed':
      return `${outcome.deviceId}: FAILED ${outcome.error.code} ${outcome.error.message}`;
    case 'skipped':
      return `${outcome.deviceId}: skipped (${outcome.reason})`;
  }
}

/**
 * Plain-text summary of a scan pass, one line per device
 */
export function formatScanReport(report: ScanReport): string {
  const header = `Scan ${report.scanId}${report.cancelled ? ' (cancelled)' : ''}: ${report.committed} committed, ${report.failed} failed, ${report.skipped} skipped`;
  const lines = report.devices.map((outcome) => `  ${describeOutcome(outcome)}`);
  return [header, ...lines].join('\n');
}
