/**
 * Plain-text dispatch summary for logs and reports
 */

import type { MarketResult } from '../types';

const MW = new Intl.NumberFormat('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });

export function formatDispatchSummary(result: MarketResult): string {
  const lines: string[] = [`Status: ${result.status}`];

  if (result.status !== 'optimal') {
    if (result.error) lines.push(`Error: ${result.error}`);
    return lines.join('\n');
  }

  lines.push(`Total Cost: $${MW.format(result.totalCost)}`);
  lines.push('', 'Dispatch Schedule:');
  for (const [region, generators] of Object.entries(result.dispatch)) {
    lines.push('', `Region ${region}:`);
    for (const [generator, output] of Object.entries(generators)) {
      lines.push(`${generator}: ${MW.format(output)} MW`);
    }
  }

  const flows = Object.entries(result.interconnectorFlows);
  if (flows.length > 0) {
    lines.push('', 'Interconnector Flows:');
    for (const [id, flow] of flows) {
      lines.push(`${id}: ${MW.format(flow)} MW`);
    }
  }

  return lines.join('\n');
}
