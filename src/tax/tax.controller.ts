import { Controller, Get, Header, HttpCode, HttpStatus, Param, ParseIntPipe } from '@nestjs/common';
import { TaxCalculatorService } from './tax-calculator.service';
import { ReportExportService } from './report-export.service';
import { TaxReportResponseDto, toTaxReportResponse } from './dto/tax-report-response.dto';

@Controller('tax')
export class TaxController {
  constructor(
    private readonly taxCalculator: TaxCalculatorService,
    private readonly reportExport: ReportExportService,
  ) {}

  /**
   * Realized gains and tax due for a fiscal year.
   * Symbols that failed are listed under `failures` and mark the report partial.
   *
   * GET /tax/2024
   */
  @Get(':year')
  @HttpCode(HttpStatus.OK)
  async getReport(@Param('year', ParseIntPipe) year: number): Promise<TaxReportResponseDto> {
    return toTaxReportResponse(await this.taxCalculator.calculate(year));
  }

  /**
   * Summary rows per symbol plus a TOTAL row.
   *
   * GET /tax/2024/summary.csv
   */
  @Get(':year/summary.csv')
  @Header('Content-Type', 'text/csv; charset=utf-8')
  async getSummaryCsv(@Param('year', ParseIntPipe) year: number): Promise<string> {
    return this.reportExport.summaryCsv(await this.taxCalculator.calculate(year));
  }

  /**
   * One row per taxable event.
   *
   * GET /tax/2024/detail.csv
   */
  @Get(':year/detail.csv')
  @Header('Content-Type', 'text/csv; charset=utf-8')
  async getDetailCsv(@Param('year', ParseIntPipe) year: number): Promise<string> {
    return this.reportExport.detailCsv(await this.taxCalculator.calculate(year));
  }
}
