import { describe, it, expect, beforeEach } from 'vitest';
import { exportFileName } from '../../src/services/ExportService.js';
import { readRatingsFromWorkbook } from '../../src/export/workbook.js';
import type { Container } from '../../src/container.js';
import type { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import type { MockExportWriter } from '../mocks/MockExportWriter.js';
import { createTestContainer } from '../mocks/testContainer.js';

const NOW = new Date('2026-05-04T10:00:00.000Z');

describe('ExportService', () => {
  let container: Container;
  let writer: MockExportWriter;
  let logProvider: ConsoleLogProvider;

  beforeEach(() => {
    ({ container, exportWriter: writer, logProvider } = createTestContainer());
  });

  describe('executive summary', () => {
    it('should hold the metrics, domain table and priority actions', async () => {
      const workbook = await container.exportService.build('executive-summary', NOW);

      expect(workbook.sheets.map((s) => s.name)).toEqual(['Executive Summary', 'Domain Summary', 'Priority Actions']);
      expect(workbook.sheets[0].rows).toEqual([
        ['Overall Maturity Score', '1.7'],
        ['Target Score', '3.3'],
        ['Assessment Cycle', 1],
        ['Date', '2026-05-04'],
      ]);
      expect(workbook.sheets[1].rows).toEqual([
        ['D 1', 'Domain One', 1.5, 3, 1.5, 2, 1],
        ['D 2', 'Domain Two', 2, 4, 2, 1, 1],
      ]);
      expect(workbook.sheets[2].rows.map((r) => r[0])).toEqual(['D 1.1', 'D 2.1']);
    });
  });

  describe('detailed report', () => {
    it('should list every row with every rating field', async () => {
      await container.assessmentService.setRatingField('D 1.1', 'actionItems', 'Name an owner');

      const workbook = await container.exportService.build('detailed-report', NOW);
      const [full, domains] = workbook.sheets;

      expect(full.name).toBe('Full Assessment');
      expect(full.rows).toHaveLength(3);
      expect(full.rows[0]).toEqual(['D 1.1', 'First', 'D 1', 'Domain One', 1, 4, 3, 'Critical', 'Name an owner', 1, 1]);
      expect(domains.name).toBe('Domain Summary');
    });

    it('should read back into the same ratings', async () => {
      const service = container.assessmentService;
      await service.setRatingField('D 1.2', 'current', 0);
      await service.setRatingField('D 2.1', 'benefit', 2);
      await service.setRatingField('D 2.1', 'effort', 0);
      await service.setRatingField('D 2.1', 'actionItems', 'Review vendor contracts');

      const workbook = await container.exportService.build('detailed-report', NOW);

      expect(readRatingsFromWorkbook(workbook)).toEqual(await service.listRatings());
    });
  });

  describe('action plan', () => {
    it('should keep open gaps only, largest first, with matrix labels', async () => {
      await container.assessmentService.setRatingField('D 2.1', 'benefit', 2);
      await container.assessmentService.setRatingField('D 2.1', 'effort', 2);

      const workbook = await container.exportService.build('action-plan', NOW);
      const [plan] = workbook.sheets;

      expect(plan.name).toBe('Action Plan');
      expect(plan.rows.map((r) => [r[0], r[5], r[10], r[11]])).toEqual([
        ['D 1.1', 3, 'Moderate', 'Moderate'],
        ['D 2.1', 2, 'Significant', 'Minimal'],
      ]);
    });
  });

  describe('export', () => {
    it('should hand the workbook to the writer under a dated name', async () => {
      const result = await container.exportService.export('action-plan', NOW);

      expect(result.location).toBe('memory://AI_Governance_Action_Plan_20260504.json');
      expect(writer.written.get(result.location)).toEqual(result.workbook);
      expect(logProvider.events.find((e) => e.message === 'Assessment exported')).toMatchObject({
        level: 'info',
        fields: { kind: 'action-plan', sheets: ['Action Plan'] },
      });
    });
  });

  describe('exportFileName', () => {
    it('should name each kind', () => {
      expect(exportFileName('executive-summary', NOW)).toBe('AI_Governance_Executive_Summary_20260504');
      expect(exportFileName('detailed-report', NOW)).toBe('AI_Governance_Detailed_Report_20260504');
    });
  });
});
