import type { CLIErrorView } from '@routespec/core';

const ESC = '\u001B[';
const RESET = `${ESC}0m`;
const STYLES = { red: `${ESC}31m`, bold: `${ESC}1m`, dim: `${ESC}2m` } as const;
type Style = keyof typeof STYLES;

function paint(text: string, enabled: boolean, ...styles: Style[]): string {
  if (!enabled || styles.length === 0) return text;
  return `${styles.map((style) => STYLES[style]).join('')}${text}${RESET}`;
}

/** Greedy word wrap; continuation lines start with `indent` */
function wrap(text: string, width: number, indent: string): string {
  const out: string[] = [];
  let current = '';
  for (const word of text.split(/\s+/).filter(Boolean)) {
    const candidate = current === '' ? word : `${current} ${word}`;
    if (candidate.length > width && current !== '') {
      out.push(current);
      current = `${indent}${word}`;
    } else {
      current = candidate;
    }
  }
  if (current !== '') out.push(current);
  return out.join('\n');
}

export function renderCLIView(view: CLIErrorView): string {
  const width = view.terminalWidth > 0 ? view.terminalWidth : 80;
  const fields: Array<[label: string, value: string | undefined]> = [
    ['', view.location],
    ['Parameter: ', view.parameter],
    ['Type: ', view.typeId],
    ['Workaround: ', view.workaround],
  ];

  const lines = [paint(view.title, view.colors, 'red', 'bold')];
  for (const [label, value] of fields) {
    if (value) {
      lines.push(wrap(`${label}${value}`, width, ' '.repeat(label.length)));
    }
  }
  lines.push(paint(`Exit code: ${view.exitCode}`, view.colors, 'dim'));
  return lines.join('\n');
}

export function stripAnsi(input: string): string {
  const ansiRe =
    /[\u001B\u009B][[\]()#;?]*(?:\d{1,4}(?:;\d{0,4})*)?[\dA-PR-TZcf-ntqry=><~]/g; // eslint-disable-line no-control-regex
  return input.replace(ansiRe, '');
}
