import * as fs from 'fs';
import * as path from 'path';
import { UsageDatasetParser } from './parsers/UsageDatasetParser';
import { BillingEngine } from './engines/BillingEngine';
import { StatementGenerator } from './generators/StatementGenerator';
import { ContractFactory } from './contracts/ContractFactory';
import { loadRateSchedule } from './config/RateSchedule';
import { BillingError, DatasetValidationError } from './errors/BillingErrors';
import { ProcessingResult, RateSchedule } from './types';

export * from './contracts';
export * from './errors/BillingErrors';
export { Bill } from './ledger/Bill';
export { createCall } from './calls/Call';
export { PhoneLine } from './lines/PhoneLine';
export { DEFAULT_RATES, loadRateSchedule } from './config/RateSchedule';
export { UsageDatasetParser, BillingEngine, StatementGenerator };
export type * from './types';

/**
 * Main application class: dataset in, billing statement out
 */
export class PhoneBilling {
  private parser: UsageDatasetParser;
  private billingEngine: BillingEngine;
  private statementGenerator: StatementGenerator;

  constructor(rates: RateSchedule = loadRateSchedule()) {
    this.parser = new UsageDatasetParser();
    this.billingEngine = new BillingEngine(new ContractFactory(rates));
    this.statementGenerator = new StatementGenerator();
  }

  /**
   * Validate a dataset, bill every line and build the statement
   */
  processDataset(data: unknown): ProcessingResult {
    console.log('🚀 Processing usage dataset...');

    const { dataset, errors } = this.parser.parse(data);
    if (errors.length > 0 || !dataset) {
      console.error('❌ Dataset validation failed:', errors);
      return {
        success: false,
        errors: errors.length > 0 ? errors : [{ field: 'root', message: 'Failed to parse dataset' }],
      };
    }

    console.log(`✅ Parsed ${dataset.lines.length} lines and ${dataset.calls.length} calls`);

    try {
      console.log('⚙️  Billing lines...');
      const result = this.billingEngine.run(dataset);

      console.log('📋 Generating statement...');
      const statement = this.statementGenerator.generateStatement(result);

      console.log(`✅ Billed ${result.calls_billed} calls across ${statement.total_lines} lines`);

      return {
        success: true,
        statement,
        warnings: statement.warnings,
      };
    } catch (error) {
      if (!(error instanceof BillingError)) {
        throw error;
      }
      console.error('💥 Error billing dataset:', error.message);
      return {
        success: false,
        errors: error instanceof DatasetValidationError
          ? error.errors
          : [{ field: 'root', message: `Billing failed: ${error.message}` }],
      };
    }
  }

  /**
   * Process dataset from file
   */
  processDatasetFromFile(filePath: string): ProcessingResult {
    let data: unknown;
    try {
      data = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (error) {
      return {
        success: false,
        errors: [{
          field: 'file',
          message: `Failed to read file: ${error instanceof Error ? error.message : 'Unknown error'}`,
        }],
      };
    }
    return this.processDataset(data);
  }

  renderText(result: ProcessingResult): string | null {
    return result.statement ? this.statementGenerator.generateTextSummary(result.statement) : null;
  }
}

/**
 * CLI entry point
 */
function main(): void {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    console.log('Usage: npm start -- <dataset.json>');
    console.log(`Example: npm start -- ${path.join('sample-data', 'usage-dataset.json')}`);
    process.exit(1);
  }

  console.log('🏁 Starting phone line billing...');
  const billing = new PhoneBilling();
  const result = billing.processDatasetFromFile(args[0]);

  if (result.success && result.statement) {
    console.log('\n📊 Statement Generated:');
    console.log(billing.renderText(result));

    const outputPath = path.join('output', `statement-${Date.now()}.json`);
    fs.mkdirSync('output', { recursive: true });
    fs.writeFileSync(outputPath, JSON.stringify(result.statement, null, 2));
    console.log(`\n💾 Statement saved to: ${outputPath}`);
  } else {
    console.error('\n❌ Processing failed:');
    console.error(result.errors);
    process.exit(1);
  }
}

// Only run main if this file is executed directly
if (require.main === module) {
  main();
}
