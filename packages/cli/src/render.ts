import type { CLIErrorView } from '@shapecheck/core';
import { ANSI, colorize } from '@shapecheck/reporter';

function wrapText(text: string, width: number): string {
  if (!text) return '';
  const words = text.split(/\s+/);
  const lines: string[] = [];
  let line = '';
  for (const word of words) {
    if ((line + (line ? ' ' : '') + word).length > width) {
      if (line) lines.push(line);
      line = word;
    } else {
      line = line ? `${line} ${word}` : word;
    }
  }
  if (line) lines.push(line);
  return lines.join('\n');
}

export function renderCLIView(view: CLIErrorView): string {
  const width = view.terminalWidth || 80;
  const lines: string[] = [];

  const title = `❌ ${view.title}`;
  lines.push(
    colorize(colorize(title, view.colors, ANSI.bold), view.colors, ANSI.red)
  );

  if (view.source) {
    // paths are not wrapped so they stay copy/pasteable
    lines.push(`📄 Source: ${view.source}`);
  }
  if (view.location) {
    lines.push(wrapText(`📍 ${view.location}`, width));
  }
  if (view.workaround) {
    lines.push(wrapText(`💡 Workaround: ${view.workaround}`, width));
  }

  return lines.join('\n');
}

export default renderCLIView;
