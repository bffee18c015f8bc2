import type { InstanceReport, Report, ReportEntry } from '../model/report.js';
import { ANSI, colorize } from './ansi.js';

export interface TextRenderOptions {
  colors?: boolean;
}

export function formatInstancePath(pointer: string): string {
  return pointer === '' ? '(root)' : pointer;
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

function renderEntry(entry: ReportEntry, depth: number, useColor: boolean): string[] {
  const indent = '  '.repeat(depth + 1);
  const where = colorize(
    `[${entry.kind} at ${entry.schemaPath}]`,
    useColor,
    ANSI.dim
  );
  const lines = [
    `${indent}- ${formatInstancePath(entry.instancePath)}: ${entry.message} ${where}`,
  ];
  for (const cause of entry.causes ?? []) {
    lines.push(...renderEntry(cause, depth + 1, useColor));
  }
  return lines;
}

function renderInstance(
  instance: InstanceReport,
  label: string,
  useColor: boolean
): string[] {
  switch (instance.status) {
    case 'valid':
      return [colorize(`${label}Validation successful!`, useColor, ANSI.green)];
    case 'aborted':
      return [
        colorize(
          `${label}${instance.error?.message ?? 'Validation aborted'}`,
          useColor,
          ANSI.yellow
        ),
      ];
    case 'invalid': {
      const header = colorize(
        `${label}Validation failed: ${plural(instance.failures.length, 'failure')}`,
        useColor,
        ANSI.red
      );
      const lines = [header];
      for (const entry of instance.failures) {
        lines.push(...renderEntry(entry, 0, useColor));
      }
      return lines;
    }
  }
}

/**
 * Human-readable report. A single instance prints just its verdict;
 * several instances are prefixed with their source (or index) and followed
 * by a totals line.
 */
export function renderTextReport(
  report: Report,
  options: TextRenderOptions = {}
): string {
  const useColor = options.colors ?? false;
  const labelled = report.instances.length > 1;

  const lines: string[] = [];
  for (const instance of report.instances) {
    const label = labelled
      ? `${instance.source ?? `#${instance.index}`}: `
      : '';
    lines.push(...renderInstance(instance, label, useColor));
  }

  if (report.instances.length > 1) {
    const { valid, invalid, aborted } = report.summary;
    lines.push('', `${valid} valid, ${invalid} invalid, ${aborted} aborted`);
  }
  return lines.join('\n');
}
