import { BillingStatement, ContractType, EngineResult, LineResult, LineStatement } from '../types';

export class StatementGenerator {
  /**
   * Generate a billing statement covering every line in an engine run
   */
  generateStatement(result: EngineResult): BillingStatement {
    const lines = result.lines.map(line => this.summarizeLine(line));
    const grandTotal = lines.reduce((sum, line) => sum + line.total_billed, 0);
    const cancelledLines = lines.filter(line => line.amount_due_on_cancel !== undefined).length;

    return {
      total_lines: lines.length,
      cancelled_lines: cancelledLines,
      grand_total: grandTotal,
      lines,
      summary: this.generateSummary(result, lines, grandTotal),
      warnings: this.generateWarnings(result),
      generated_at: new Date().toISOString(),
    };
  }

  private summarizeLine(line: LineResult): LineStatement {
    const billedMinutes = line.bills.reduce((sum, bill) => sum + bill.billed_mins, 0);
    const freeMinutes = line.bills.reduce((sum, bill) => sum + bill.free_mins, 0);

    return {
      number: line.number,
      contract_type: line.contract_type,
      months_billed: line.bills.length,
      total_billed: this.totalBilled(line),
      total_minutes: billedMinutes + freeMinutes,
      billed_minutes: billedMinutes,
      free_minutes: freeMinutes,
      amount_due_on_cancel: line.amount_due_on_cancel,
    };
  }

  /**
   * What the customer was actually charged over the run.
   *
   * A prepaid bill carries the whole credit balance as a fixed cost every
   * month, so summing monthly totals would count that balance once per
   * month. Prepaid lines are charged their top-ups plus call costs instead.
   */
  private totalBilled(line: LineResult): number {
    if (line.contract_type === 'prepaid') {
      const callCosts = line.bills.reduce((sum, bill) => sum + bill.billed_mins * bill.min_rate, 0);
      return (line.top_ups_charged ?? 0) + callCosts;
    }
    return line.bills.reduce((sum, bill) => sum + bill.total, 0);
  }

  /**
   * Generate a human-readable summary
   */
  private generateSummary(result: EngineResult, lines: LineStatement[], grandTotal: number): string {
    const { first_month: first, last_month: last } = result;
    const summaryParts: string[] = [];

    summaryParts.push(`Billing period: ${formatMonth(first.month, first.year)} to ${formatMonth(last.month, last.year)}`);
    summaryParts.push(`${lines.length} line${lines.length === 1 ? '' : 's'}, ${result.calls_billed} call${result.calls_billed === 1 ? '' : 's'} billed`);

    const byType = this.groupLinesByType(lines);
    Object.entries(byType).forEach(([type, group]) => {
      summaryParts.push(`${group.length} ${this.getContractTypeLabel(type)}`);
    });

    summaryParts.push(`Total billed: $${grandTotal.toFixed(2)}`);
    return summaryParts.join('\n');
  }

  /**
   * Generate warnings for outcomes worth a second look
   */
  private generateWarnings(result: EngineResult): string[] {
    const warnings: string[] = [];

    if (result.calls_skipped > 0) {
      warnings.push(`${result.calls_skipped} call${result.calls_skipped > 1 ? 's' : ''} skipped: line not in service`);
    }

    for (const line of result.lines) {
      if (line.amount_due_on_cancel === undefined) {
        continue;
      }
      if (line.contract_type === 'term' && !line.deposit_released) {
        warnings.push(`${line.number}: term cancelled early, deposit forfeited`);
      }
      const lastBill = line.bills[line.bills.length - 1];
      if (line.contract_type === 'prepaid' && lastBill && lastBill.total < 0) {
        warnings.push(`${line.number}: prepaid credit of $${(-lastBill.total).toFixed(2)} forfeited on cancellation`);
      }
    }

    return warnings;
  }

  private groupLinesByType(lines: LineStatement[]): Partial<Record<ContractType, LineStatement[]>> {
    const groups: Partial<Record<ContractType, LineStatement[]>> = {};
    for (const line of lines) {
      (groups[line.contract_type] ??= []).push(line);
    }
    return groups;
  }

  private getContractTypeLabel(type: string): string {
    const labels: Record<string, string> = {
      mtm: 'Month-to-Month',
      term: 'Fixed-Term',
      prepaid: 'Prepaid',
    };
    return labels[type] || type;
  }

  /**
   * Export per-line totals as CSV for spreadsheet import
   */
  generateCSV(statement: BillingStatement): string {
    const headers = [
      'Number',
      'Plan',
      'Months Billed',
      'Billed Minutes',
      'Free Minutes',
      'Total Billed (USD)',
      'Due On Cancel (USD)',
    ];

    const rows = statement.lines.map(line => [
      line.number,
      line.contract_type,
      line.months_billed.toString(),
      line.billed_minutes.toString(),
      line.free_minutes.toString(),
      line.total_billed.toFixed(2),
      line.amount_due_on_cancel !== undefined ? line.amount_due_on_cancel.toFixed(2) : '',
    ]);

    return [
      headers.join(','),
      ...rows.map(row => row.map(cell => `"${cell}"`).join(',')),
    ].join('\n');
  }

  /**
   * Generate a simple text summary for quick review
   */
  generateTextSummary(statement: BillingStatement): string {
    const lines: string[] = [];

    lines.push('PHONE LINE BILLING STATEMENT');
    lines.push('============================');
    lines.push(statement.summary);
    lines.push('');

    if (statement.warnings.length > 0) {
      lines.push('WARNINGS:');
      statement.warnings.forEach(warning => {
        lines.push(`⚠️  ${warning}`);
      });
      lines.push('');
    }

    lines.push(`LINES (${statement.total_lines}):`);
    lines.push('--------------------------------');
    statement.lines.forEach(line => {
      lines.push(`${line.number} [${this.getContractTypeLabel(line.contract_type)}]`);
      lines.push(`   Months: ${line.months_billed}`);
      lines.push(`   Minutes: ${line.total_minutes} (${line.billed_minutes} billed, ${line.free_minutes} free)`);
      lines.push(`   Billed: $${line.total_billed.toFixed(2)}`);
      if (line.amount_due_on_cancel !== undefined) {
        lines.push(`   Due on cancellation: $${line.amount_due_on_cancel.toFixed(2)}`);
      }
    });

    return lines.join('\n');
  }
}

function formatMonth(month: number, year: number): string {
  return `${year}-${String(month).padStart(2, '0')}`;
}
