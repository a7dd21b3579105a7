#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Command } from 'commander';
import { AppModule } from './app.module';
import { ExchangeRateService } from './exchange-rate/exchange-rate.service';
import { importLedger, readLedgerFile } from './ledger/ledger.loader';
import { LoggerService } from './logger/logger.service';
import { OrdersService } from './orders/orders.service';
import { ReportExportService } from './tax/report-export.service';
import { TaxCalculatorService } from './tax/tax-calculator.service';

const program = new Command();

program.name('tax-replay').description('Capital gains from weighted-average cost replay').version('1.0.0');

program
  .command('calculate')
  .description('Calculate realized gains and tax due for a fiscal year')
  .requiredOption('-y, --year <year>', 'fiscal year', (value) => Number.parseInt(value, 10))
  .requiredOption('-l, --ledger <file>', 'JSON ledger with orders and exchange rates')
  .option('--detail', 'print one row per taxable event instead of the summary')
  .action(async (options: { year: number; ledger: string; detail?: boolean }) => {
    if (!Number.isInteger(options.year)) {
      throw new Error('--year must be an integer');
    }
    const ledger = readLedgerFile(options.ledger);
    if (ledger.isErr()) {
      throw ledger.error;
    }

    const app = await NestFactory.createApplicationContext(AppModule, { bufferLogs: true });
    const logger = app.get(LoggerService);
    app.useLogger(logger);
    try {
      const recorded = importLedger(ledger.value, app.get(OrdersService), app.get(ExchangeRateService));
      logger.log(`Loaded ${recorded} orders from ${options.ledger}`, 'CLI');

      const report = await app.get(TaxCalculatorService).calculate(options.year);
      const exporter = app.get(ReportExportService);
      process.stdout.write(options.detail ? exporter.detailCsv(report) : exporter.summaryCsv(report));

      for (const warning of report.warnings) {
        process.stderr.write(`warning ${warning.symbol} ${warning.code}: ${warning.message}\n`);
      }
      for (const failure of report.failures) {
        process.stderr.write(`failed  ${failure.symbol} ${failure.code}: ${failure.message}\n`);
      }
      if (report.status === 'partial') {
        process.exitCode = 1;
      }
    } finally {
      await app.close();
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});
