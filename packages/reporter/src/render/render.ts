import type { Report } from '../model/report.js';
import { renderJsonReport } from './json.js';
import { renderMarkdownReport } from './markdown.js';
import { renderTextReport, type TextRenderOptions } from './text.js';

export const REPORT_FORMATS = ['text', 'json', 'markdown'] as const;
export type ReportFormat = (typeof REPORT_FORMATS)[number];

export function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some((format) => format === value);
}

export function renderReport(
  report: Report,
  format: ReportFormat,
  options: TextRenderOptions = {}
): string {
  if (format === 'json') return renderJsonReport(report);
  if (format === 'markdown') return renderMarkdownReport(report);
  return renderTextReport(report, options);
}
