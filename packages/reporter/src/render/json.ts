import type { Report } from '../model/report.js';

export function renderJsonReport(report: Report): string {
  return JSON.stringify(report, null, 2);
}
