import { Type } from 'class-transformer';
import { ArrayNotEmpty, IsArray, IsNumberString, Matches, ValidateNested } from 'class-validator';

// Historical rate: units of base currency per one unit of `currency` on `date`.
export class RecordRateDto {
  @Matches(/^\d{4}-\d{2}-\d{2}$/)
  date!: string;

  @Matches(/^[A-Z]{3}$/)
  currency!: string;

  @IsNumberString()
  rate!: string;
}

// Record rates for many dates at once
export class BulkRecordRatesDto {
  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => RecordRateDto)
  rates!: RecordRateDto[];
}
