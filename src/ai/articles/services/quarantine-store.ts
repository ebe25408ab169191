/**
 * Quarantine Store
 *
 * Append-only sink for sessions that did not make it to publication. Each
 * record is a JSON snapshot plus a markdown report for humans, named
 * `<sessionId>-<timestamp>`. Existing files are never overwritten: a name
 * that is taken gets a numeric suffix.
 */

import { basename } from 'node:path';

import type { GateResult, PipelineSession, PipelineStage, QuarantineRef, SessionAnnotationKind } from '../types';
import { writeFileExclusive, writeFileWithUniqueName } from './atomic-write';

// ============================================================================
// Types
// ============================================================================

export interface FailureReport {
  readonly kind: SessionAnnotationKind;
  /** Stage that failed */
  readonly stage: PipelineStage;
  readonly lastCompletedStage: PipelineStage | null;
  readonly message: string;
  /** The failing gate, with every check's rationale; null for fatal errors */
  readonly failedGate: GateResult | null;
  readonly quarantinedAt: string;
}

export interface QuarantineRecord {
  readonly sessionSnapshot: PipelineSession;
  readonly failureReport: FailureReport;
}

export interface QuarantineStore {
  write(record: QuarantineRecord): Promise<QuarantineRef>;
}

// ============================================================================
// Report
// ============================================================================

/**
 * Markdown report listing every check of the failing gate, passed ones
 * included.
 */
export function formatQuarantineReport(record: QuarantineRecord): string {
  const { sessionSnapshot: session, failureReport: report } = record;
  const lines = [
    `# Quarantined: ${session.topic.title}`,
    '',
    `- **Session:** ${session.id}`,
    `- **Reason:** ${report.kind}`,
    `- **Failed at:** ${report.stage}`,
    `- **Last completed stage:** ${report.lastCompletedStage ?? 'none'}`,
    `- **Quarantined at:** ${report.quarantinedAt}`,
    '',
    report.message,
  ];

  if (report.failedGate) {
    lines.push('', `## Gate: ${report.failedGate.gateName}`, '', '| Check | Result | Rationale |', '|---|---|---|');
    for (const check of report.failedGate.checks) {
      const result = check.notApplicable ? 'N/A' : check.passed ? 'PASS' : 'FAIL';
      lines.push(`| ${check.name} | ${result} | ${check.rationale.replace(/\|/g, '\\|').replace(/\n/g, ' ')} |`);
    }
  }

  return `${lines.join('\n')}\n`;
}

export function quarantineFileStem(sessionId: string, quarantinedAt: string): string {
  return `${sessionId}-${quarantinedAt.replace(/[:.]/g, '-')}`;
}

// ============================================================================
// File Store
// ============================================================================

export class FileQuarantineStore implements QuarantineStore {
  constructor(private readonly directory: string) {}

  async write(record: QuarantineRecord): Promise<QuarantineRef> {
    const stem = quarantineFileStem(record.sessionSnapshot.id, record.failureReport.quarantinedAt);
    const recordPath = await writeFileWithUniqueName(
      this.directory,
      stem,
      '.json',
      `${JSON.stringify(record, null, 2)}\n`
    );

    // The report shares the record's (unique) stem
    const reportPath = recordPath.replace(/\.json$/, '.md');
    if (!(await writeFileExclusive(reportPath, formatQuarantineReport(record)))) {
      throw new Error(`Quarantine report ${reportPath} already exists`);
    }

    return { sessionId: record.sessionSnapshot.id, recordPath, reportPath };
  }
}

export function describeQuarantineRef(ref: QuarantineRef): string {
  return `${ref.sessionId} (${basename(ref.recordPath)})`;
}
