// Response after recording or listing an order.
// Decimal values are serialized as plain strings to keep full precision.
export interface OrderResponseDto {
  id: string;                     // internal ID
  orderId: string;                // broker order ID
  symbol: string;
  side: string;
  quantity: string;
  price: string;
  currency: string;
  fees: { name: string; amount: string }[] | null;   // null = unknown
  tradeDate: string;
  sequenceId: number;
  createdAt?: string;
}

export interface RecordOrderResponseDto extends OrderResponseDto {
  message: string;
  duplicate: boolean;             // true if order was already recorded
}
