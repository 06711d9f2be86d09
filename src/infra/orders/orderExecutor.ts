import type { OrderSide } from '../../types.js';

export interface PlaceOrderRequest {
  accountId: string;
  address: string;
  market: string;
  side: OrderSide;
  size: number;
  /** Closing orders only reduce an existing position. */
  reduceOnly: boolean;
}

export interface FillListener {
  onFill(orderRef: string, filledSize: number, avgPrice: number): Promise<void>;
  onReject(orderRef: string, reason: string): Promise<void>;
}

/**
 * Exchange boundary. `placeOrder` resolves with the order reference or throws
 * `NetworkError` / `OrderRejectedError`; fills and rejections arrive later, in any
 * order, through the listener.
 */
export interface OrderExecutor {
  placeOrder(request: PlaceOrderRequest): Promise<string>;
  cancelOrder(orderRef: string): Promise<void>;
  setListener(listener: FillListener): void;
  close(): Promise<void>;
}
