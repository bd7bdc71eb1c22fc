export type TrackedGame = {
  appid: number;
  name: string;
};

export type SaleInfo = {
  onSale: boolean;
  discountPercent: number;
  originalPrice: number | null; // minor units (cents)
  finalPrice: number | null;
};

export type Observation = {
  id?: number;
  game_id: number;
  timestamp: number; // seconds since epoch
  player_count: number;
  on_sale: boolean;
  discount_percent: number;
  original_price: number | null;
  final_price: number | null;
  estimated_owners: string;
};

// 'fallback' means the request failed and the neutral default was substituted
export type CollectorResult<T> =
  | { status: 'observed'; value: T }
  | { status: 'fallback'; value: T; reason: string };
