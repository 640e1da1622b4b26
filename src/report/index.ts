/**
 * checkdesk Report — exports.
 */

export { parseFindings, summarizeFindings, loadSummary, emptySummary, FINDING_SEVERITIES } from './summary.js';
