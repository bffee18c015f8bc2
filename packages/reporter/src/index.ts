export {
  buildReportSummary,
  type InstanceReport,
  type InstanceStatus,
  type Report,
  type ReportEntry,
  type ReportMeta,
  type ReportSummary,
} from './model/report.js';
export {
  buildReport,
  hashSchema,
  toReportEntry,
  type BuildReportOptions,
} from './engine/report-builder.js';
export { ANSI, colorize, stripAnsi } from './render/ansi.js';
export {
  formatInstancePath,
  renderTextReport,
  type TextRenderOptions,
} from './render/text.js';
export { renderJsonReport } from './render/json.js';
export { renderMarkdownReport } from './render/markdown.js';
export {
  REPORT_FORMATS,
  isReportFormat,
  renderReport,
  type ReportFormat,
} from './render/render.js';
