import type { Workbook } from 'exceljs';
import type { SceneIssue } from '@framecheck/shared';
import { createWorkbook, formatHeaderRow, autoFitColumns, highlightErrors } from './utils.js';

const SEVERITY_ORDER: Record<SceneIssue['severity'], number> = {
    error: 0,
    warning: 1,
    info: 2,
};

export interface ReportSummary {
    scene: string;
    nodesChecked: number;
}

/**
 * Scene check report: an "Issues" sheet with one row per issue, ordered by
 * severity then node name, and a "Summary" sheet of counts.
 */
export async function generateIssuesExcel(issues: SceneIssue[], summary: ReportSummary): Promise<Workbook> {
    const workbook = createWorkbook();
    const sheet = workbook.addWorksheet('Issues');

    sheet.columns = [
        { header: 'node', key: 'node' },
        { header: 'class', key: 'class' },
        { header: 'check', key: 'check' },
        { header: 'severity', key: 'severity' },
        { header: 'current', key: 'current' },
        { header: 'expected', key: 'expected' },
        { header: 'details', key: 'details' },
    ];

    const ordered = [...issues].sort(
        (a, b) => SEVERITY_ORDER[a.severity] - SEVERITY_ORDER[b.severity] || a.node.localeCompare(b.node)
    );

    for (const issue of ordered) {
        const row = sheet.addRow({
            node: issue.node,
            class: issue.node_class,
            check: issue.check,
            severity: issue.severity,
            current: issue.current,
            expected: issue.expected,
            details: issue.messages.join('\n'),
        });
        row.getCell('details').alignment = { wrapText: true, vertical: 'top' };
    }

    formatHeaderRow(sheet);
    highlightErrors(sheet, 'severity');
    autoFitColumns(sheet);

    const summarySheet = workbook.addWorksheet('Summary');
    summarySheet.columns = [
        { header: 'metric', key: 'metric' },
        { header: 'value', key: 'value' },
    ];

    const count = (predicate: (i: SceneIssue) => boolean) => issues.filter(predicate).length;
    summarySheet.addRows([
        { metric: 'Scene', value: summary.scene },
        { metric: 'Nodes checked', value: summary.nodesChecked },
        { metric: 'Issues', value: issues.length },
        { metric: 'Errors', value: count((i) => i.severity === 'error') },
        { metric: 'Warnings', value: count((i) => i.severity === 'warning') },
        { metric: 'Info', value: count((i) => i.severity === 'info') },
        { metric: 'Filename issues', value: count((i) => i.check === 'filename') },
        { metric: 'Colorspace issues', value: count((i) => i.check === 'colorspace') },
    ]);

    formatHeaderRow(summarySheet);
    autoFitColumns(summarySheet);

    return workbook;
}
