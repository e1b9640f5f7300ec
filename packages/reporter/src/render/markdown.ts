import type {
  ConformanceSection,
  DiagnosticEnvelope,
  Report,
} from '../model/report.js';

function formatDetails(details?: unknown): string {
  if (details === undefined) {
    return 'n/a';
  }
  const serialized = JSON.stringify(details);
  return serialized.length > 120 ? `${serialized.slice(0, 117)}...` : serialized;
}

function renderDiagnosticsList(diagnostics: readonly DiagnosticEnvelope[]): string[] {
  if (diagnostics.length === 0) {
    return ['No diagnostics.'];
  }
  return diagnostics.map(
    (diag) => `- ${diag.code} @ ${diag.location} (${formatDetails(diag.details)})`
  );
}

function renderSectionTable(sections: readonly ConformanceSection[]): string[] {
  if (sections.length === 0) {
    return ['No request or response body types are reachable.'];
  }
  const header = '| Type | Schema | First seen | Samples | Result |';
  const divider = '|---|---|---|---|---|';
  const rows = sections.map(
    (section) =>
      `| \`${section.typeId}\` | ${section.name ?? 'inline'} | ${section.firstSeen} | ${section.samplesChecked} | ${section.passed ? 'pass' : 'FAIL'} |`
  );
  return [header, divider, ...rows];
}

function renderSection(section: ConformanceSection): string[] {
  const lines = [
    `### ${section.typeId}: ${section.passed ? 'pass' : 'FAIL'}`,
    '',
    `- samples checked: ${section.samplesChecked}`,
  ];
  const example = section.examples[0];
  if (example !== undefined) {
    lines.push('- example:', '', '```json', JSON.stringify(example, null, 2), '```');
  }
  const failure = section.failure;
  if (failure !== undefined) {
    lines.push('', `- failing sample: #${failure.sampleIndex}`);
    if (failure.encoded !== undefined) {
      lines.push('', '```json', JSON.stringify(failure.encoded, null, 2), '```');
    }
    lines.push('', '- errors:');
    failure.errors.forEach((error) => {
      lines.push(
        `  - ${error.keyword} at \`${error.path || '/'}\`: ${error.message}`
      );
    });
  }
  return lines;
}

export function renderMarkdownReport(report: Report): string {
  const lines: string[] = [];
  const summary = report.summary;

  lines.push(`# Wire Conformance Report – ${report.apiId}`, '');
  lines.push(`- Tool: ${report.meta.toolName} ${report.meta.toolVersion}`);
  lines.push(`- Engine: ${report.meta.engineVersion ?? 'n/a'}`);
  lines.push(`- Timestamp: ${report.meta.timestamp}`);
  lines.push(`- Seed: ${report.meta.seed}`);
  lines.push(`- Samples per type: ${report.meta.samplesPerType}`);
  lines.push(`- Types: ${summary.types}`);
  lines.push(
    `  - passed: ${summary.passed}`,
    `  - failed: ${summary.failed}`,
    `- Samples checked: ${summary.samples}`
  );

  lines.push('', '## Timings', '', '| Step | Duration (ms) |', '|---|---|');
  lines.push(`| validate | ${summary.timings.validateMs.toFixed(2)} |`);

  lines.push('', '## Types', '');
  lines.push(...renderSectionTable(report.sections));

  lines.push('', '## Diagnostics', '');
  lines.push(...renderDiagnosticsList(report.diagnostics));

  lines.push('', '## Sections', '');
  report.sections.forEach((section, idx) => {
    if (idx > 0) {
      lines.push('');
    }
    lines.push(...renderSection(section));
  });

  return lines.join('\n');
}
