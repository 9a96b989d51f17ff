import { mkdir } from 'node:fs/promises';
import { basename, dirname } from 'node:path';
import type { PipelineStep } from '../types.js';
import { getReportPath } from '../../workspace/paths.js';
import { generateIssuesExcel } from '../../excel/report.js';
import { errorMessage } from '../../utils/console.js';

/**
 * Step 4: Report Export
 * Writes the issues workbook to --report, or to the workspace reports folder.
 */
export const exportReport: PipelineStep = async (state) => {
    if (state.options.dryRun) {
        state.warnings.push('Dry run: Skipping report export.');
        return state;
    }

    const reportPath = state.options.report
        ?? (state.workspace ? getReportPath(state.workspace, state.scenePath) : undefined);
    if (!reportPath) {
        return state;
    }

    try {
        await mkdir(dirname(reportPath), { recursive: true });
        const workbook = await generateIssuesExcel(state.issues, {
            scene: basename(state.scenePath),
            nodesChecked: state.nodes.filter((n) => !n.disabled).length,
        });
        await workbook.xlsx.writeFile(reportPath);
        state.reportPath = reportPath;
    } catch (err) {
        state.errors.push({
            step: 'export',
            message: `Failed to export report to ${reportPath}: ${errorMessage(err)}`,
            fatal: true,
            error: err,
        });
    }

    return state;
};
