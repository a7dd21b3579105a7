import { Type } from 'class-transformer';
import {
  IsArray,
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsNumberString,
  IsOptional,
  IsPositive,
  IsString,
  Matches,
  ValidateNested,
} from 'class-validator';
import { OrderSide } from '../entities/order.entity';

export class FeeItemDto {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsNumberString()
  amount!: string;
}

// DTO for recording an executed broker order.
// orderId is the idempotency key (prevents duplicates).
// Omitting fees marks them unknown; an empty array means no fees were charged.
export class CreateOrderDto {
  @IsString()
  @IsNotEmpty()
  orderId!: string;

  @IsString()
  @IsNotEmpty()
  symbol!: string;

  @IsEnum(OrderSide)
  side!: OrderSide;

  @IsNumberString()
  quantity!: string;

  @IsNumberString()
  price!: string;

  @Matches(/^[A-Z]{3}$/)
  currency!: string;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => FeeItemDto)
  fees?: FeeItemDto[];

  @Matches(/^\d{4}-\d{2}-\d{2}$/)
  tradeDate!: string;

  // Broker-supplied ordering within a day; assigned on arrival when omitted.
  @IsOptional()
  @IsInt()
  @IsPositive()
  sequenceId?: number;
}
