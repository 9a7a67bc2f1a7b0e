/**
 * Export service.
 * Builds the executive summary, detailed report and action plan workbooks
 * from the current ratings and hands them to the export writer.
 */

import type { ExportKind } from '../types/api.js';
import type { IExportWriter } from '../export/IExportWriter.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { AssessmentService } from './AssessmentService.js';
import { aggregateByDomain, isCriticalOrHigh, overallScore, sortByGapDescending } from '../scoring/index.js';
import type { AssessmentRow, DomainSummary } from '../types/models.js';
import {
  actionPlanSheet,
  domainSummarySheet,
  fullAssessmentSheet,
  priorityActionsSheet,
  type Workbook,
} from '../export/workbook.js';

const FILE_PREFIX: Record<ExportKind, string> = {
  'executive-summary': 'AI_Governance_Executive_Summary',
  'detailed-report': 'AI_Governance_Detailed_Report',
  'action-plan': 'AI_Governance_Action_Plan',
};

export interface ExportResult {
  kind: ExportKind;
  location: string;
  workbook: Workbook;
}

export class ExportService {
  constructor(
    private readonly assessmentService: AssessmentService,
    private readonly writer: IExportWriter,
    private readonly logProvider: ILogProvider
  ) {}

  async build(kind: ExportKind, now = new Date()): Promise<Workbook> {
    switch (kind) {
      case 'executive-summary':
        return this.executiveSummary(now);
      case 'detailed-report':
        return this.detailedReport();
      case 'action-plan':
        return this.actionPlan();
    }
  }

  async export(kind: ExportKind, now = new Date()): Promise<ExportResult> {
    const workbook = await this.build(kind, now);
    const location = await this.writer.write(exportFileName(kind, now), workbook);

    this.logProvider.info('Assessment exported', {
      kind,
      location,
      sheets: workbook.sheets.map((s) => s.name),
    });

    return { kind, location, workbook };
  }

  private async executiveSummary(now: Date): Promise<Workbook> {
    const rows = await this.assessmentService.getRows();
    const score = overallScore(rows);
    const { cycle } = await this.assessmentService.getHistory();

    return {
      title: 'AI Governance Executive Summary',
      sheets: [
        {
          name: 'Executive Summary',
          columns: ['Metric', 'Value'],
          rows: [
            ['Overall Maturity Score', score.overallScore.toFixed(1)],
            ['Target Score', score.targetScore.toFixed(1)],
            ['Assessment Cycle', cycle],
            ['Date', isoDate(now)],
          ],
        },
        domainSummarySheet('Domain Summary', this.summarize(rows)),
        priorityActionsSheet(rows.filter((r) => isCriticalOrHigh(r.priority))),
      ],
    };
  }

  private async detailedReport(): Promise<Workbook> {
    const rows = await this.assessmentService.getRows();

    return {
      title: 'AI Governance Detailed Report',
      sheets: [fullAssessmentSheet(rows), domainSummarySheet('Domain Summary', this.summarize(rows))],
    };
  }

  // Derived from the rows already read for the detail sheets
  private summarize(rows: readonly AssessmentRow[]): DomainSummary[] {
    return aggregateByDomain(rows, this.assessmentService.listDomains());
  }

  private async actionPlan(): Promise<Workbook> {
    const rows = sortByGapDescending(await this.assessmentService.getRows());

    return {
      title: 'AI Governance Action Plan',
      sheets: [actionPlanSheet(rows.filter((r) => r.gap > 0))],
    };
  }
}

/** e.g. AI_Governance_Action_Plan_20261019 */
export function exportFileName(kind: ExportKind, now: Date): string {
  return `${FILE_PREFIX[kind]}_${isoDate(now).replace(/-/g, '')}`;
}

function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}
