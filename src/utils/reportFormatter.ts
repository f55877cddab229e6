import { z } from 'zod';
import { toFindingRecord, type Finding } from '../types/finding';

export const OutputFormatSchema = z.enum(['table', 'json', 'csv']);
export type OutputFormat = z.infer<typeof OutputFormatSchema>;

export const NO_FINDINGS_MESSAGE = 'No containers with missing resource limits found.';

export const CSV_HEADER = 'NAMESPACE,POD_NAME,CONTAINER_NAME,MISSING_CPU_LIMIT,MISSING_MEMORY_LIMIT';

interface TableColumn {
  header: string;
  value: (finding: Finding) => string;
}

const yesNo = (flag: boolean): string => (flag ? 'YES' : 'NO');

const TABLE_COLUMNS: TableColumn[] = [
  { header: 'NAMESPACE', value: f => f.namespace },
  { header: 'POD NAME', value: f => f.podName },
  { header: 'CONTAINER NAME', value: f => f.containerName },
  { header: 'MISSING CPU', value: f => yesNo(f.missingCpuLimit) },
  { header: 'MISSING MEMORY', value: f => yesNo(f.missingMemoryLimit) }
];

function renderRow(cells: string[]): string {
  return `| ${cells.join(' | ')} |`;
}

export function formatTable(findings: readonly Finding[]): string {
  if (findings.length === 0) return NO_FINDINGS_MESSAGE;

  const columns = TABLE_COLUMNS.map(column => ({
    ...column,
    width: findings.reduce((width, f) => Math.max(width, column.value(f).length), column.header.length)
  }));

  const separator = `+${columns.map(c => '-'.repeat(c.width + 2)).join('+')}+`;
  const lines: string[] = [];

  lines.push(separator);
  lines.push(renderRow(columns.map(c => c.header.padEnd(c.width))));
  lines.push(separator);
  findings.forEach(finding => {
    lines.push(renderRow(columns.map(c => c.value(finding).padEnd(c.width))));
  });
  lines.push(separator);

  return lines.join('\n');
}

export function formatJson(findings: readonly Finding[]): string {
  return JSON.stringify(findings.map(toFindingRecord), null, 2);
}

// Fields are quoted but not escaped: Kubernetes names cannot contain quotes or commas
export function formatCsv(findings: readonly Finding[]): string {
  const lines = [CSV_HEADER];

  for (const finding of findings) {
    const record = toFindingRecord(finding);
    const fields = [
      record.namespace,
      record.pod_name,
      record.container_name,
      String(record.missing_cpu_limit),
      String(record.missing_memory_limit)
    ];
    lines.push(fields.map(field => `"${field}"`).join(','));
  }

  return lines.join('\n');
}

export function formatFindings(format: OutputFormat, findings: readonly Finding[]): string {
  switch (format) {
    case 'json':
      return formatJson(findings);
    case 'csv':
      return formatCsv(findings);
    case 'table':
      return formatTable(findings);
  }
}
