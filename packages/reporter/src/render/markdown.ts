import type { InstanceReport, Report, ReportEntry } from '../model/report.js';
import { formatInstancePath } from './text.js';

function formatDetails(details: ReportEntry['details']): string {
  if (Object.keys(details).length === 0) {
    return '—';
  }
  const serialized = JSON.stringify(details);
  return serialized.length > 120 ? `${serialized.slice(0, 117)}…` : serialized;
}

function cell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

function renderEntryRows(entry: ReportEntry, depth: number): string[] {
  const marker = depth > 0 ? `${'↳ '.repeat(depth)}` : '';
  const row = [
    `${marker}\`${cell(formatInstancePath(entry.instancePath))}\``,
    `\`${cell(entry.schemaPath)}\``,
    entry.kind,
    cell(entry.message),
    cell(formatDetails(entry.details)),
  ];
  const rows = [`| ${row.join(' | ')} |`];
  for (const cause of entry.causes ?? []) {
    rows.push(...renderEntryRows(cause, depth + 1));
  }
  return rows;
}

function renderInstance(instance: InstanceReport): string[] {
  const lines = [`### Instance #${instance.index} – ${instance.status}`];
  if (instance.source !== undefined) {
    lines.push('', `- source: ${instance.source}`);
  }
  if (instance.status === 'aborted') {
    lines.push('', instance.error?.message ?? 'Validation aborted');
    return lines;
  }
  if (instance.failures.length === 0) {
    lines.push('', 'No failures.');
    return lines;
  }
  lines.push(
    '',
    '| Instance path | Schema path | Kind | Message | Details |',
    '|---|---|---|---|---|'
  );
  for (const entry of instance.failures) {
    lines.push(...renderEntryRows(entry, 0));
  }
  return lines;
}

export function renderMarkdownReport(report: Report): string {
  const lines: string[] = [];
  const summary = report.summary;

  lines.push(`# Validation Report – ${report.schemaId}`, '');
  lines.push(`- Tool: ${report.meta.toolName} ${report.meta.toolVersion}`);
  lines.push(`- Engine: ${report.meta.engineVersion ?? 'n/a'}`);
  lines.push(`- Timestamp: ${report.meta.timestamp}`);
  lines.push(`- Dialect: ${report.dialect}`);
  if (report.pointer !== undefined) {
    lines.push(`- Pointer: \`${report.pointer}\``);
  }
  lines.push(`- Schema hash: \`${report.schemaHash}\``);
  lines.push(`- Instances: ${summary.totalInstances}`);
  lines.push(
    `  - valid: ${summary.valid}`,
    `  - invalid: ${summary.invalid}`,
    `  - aborted: ${summary.aborted}`
  );

  lines.push('', '## Failures', '');
  lines.push(
    `- Total: ${summary.failures.total}`,
    `- Semantic: ${summary.failures.semantic}`,
    `- Structural: ${summary.failures.structural}`
  );
  const kinds = Object.entries(summary.byKind);
  if (kinds.length > 0) {
    lines.push('', '| Kind | Count |', '|---|---|');
    for (const [kind, count] of kinds) {
      lines.push(`| ${kind} | ${count ?? 0} |`);
    }
  }

  lines.push('', '## Instances', '');
  report.instances.forEach((instance, idx) => {
    if (idx > 0) {
      lines.push('');
    }
    lines.push(...renderInstance(instance));
  });

  return lines.join('\n');
}
