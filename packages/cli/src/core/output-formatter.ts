/**
 * Output formatting for command results
 */

import type { Dataset, OperationDescriptor, ParameterDescriptor } from '@tabflow/core';
import { formatCsv, formatJson } from '@tabflow/io';

export type OutputFormat = 'csv' | 'json';

export function formatDataset(dataset: Dataset, format: OutputFormat): string {
  return format === 'json' ? formatJson(dataset) : formatCsv(dataset);
}

function formatParameter(parameter: ParameterDescriptor): string {
  let line = `    ${parameter.name}${parameter.required ? '' : '?'}: ${parameter.type}`;
  if (parameter.default !== undefined) {
    line += ` = ${JSON.stringify(parameter.default)}`;
  }
  if (parameter.description) {
    line += `  ${parameter.description}`;
  }
  return line;
}

/**
 * Human-readable operation listing
 */
export function formatOperations(operations: readonly OperationDescriptor[]): string {
  const lines: string[] = [];
  for (const operation of operations) {
    lines.push(`  ${operation.name.padEnd(20)} ${operation.description}`);
    for (const parameter of operation.parameters) {
      lines.push(formatParameter(parameter));
    }
  }
  return `${lines.join('\n')}\n`;
}
