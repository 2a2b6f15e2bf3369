// ---------------------------------------------------------------------------
// Barte SDK – Orders Resource
// ---------------------------------------------------------------------------
// Orders are the billing intent; the server fans each order out into one or
// more charges, returned inside the order.
// ---------------------------------------------------------------------------

import { API_VERSION_PREFIX } from "../config";
import { decode } from "../decoding";
import { bindOrder, type ClientBinding, type Order } from "../entities";
import { bodyOf, type Transport } from "../http";
import { orderSchema } from "../models/order";
import { encodeOrderRequest } from "../models/requests";
import type {
  CreateCardOrderParams,
  CreateOrderParams,
  CreatePixOrderParams,
} from "../types";

/**
 * Resource class for Barte orders.
 *
 * @example
 * ```ts
 * const order = await barte.orders.createPix({
 *   title: "Order #123",
 *   value: 99.9,
 *   startDate: new Date(),
 *   customer: { document: "00000000000", type: "CPF", name: "Maria", email: "maria@example.com", phone: "11999999999" },
 *   idempotencyKey: "order-123",
 * });
 * ```
 */
export class OrdersResource {
  constructor(
    private readonly transport: Transport,
    private readonly binding: ClientBinding,
  ) {}

  /**
   * Create an order.
   *
   * @throws {RequestValidationError} if `idempotencyKey` is blank.
   */
  async create(params: CreateOrderParams): Promise<Order> {
    const body = encodeOrderRequest(params);
    const result = await this.transport.send(
      "POST",
      `${API_VERSION_PREFIX}/orders`,
      undefined,
      body,
    );
    return bindOrder(decode(orderSchema, bodyOf(result), "Order"), this.binding);
  }

  /** Create an order paid with PIX. */
  async createPix(params: CreatePixOrderParams): Promise<Order> {
    return this.create({ ...params, payment: { method: "PIX" } });
  }

  /** Create an order paid with a previously tokenized card. */
  async createWithCardToken(
    cardToken: string,
    params: CreateCardOrderParams,
  ): Promise<Order> {
    const { paymentMethod, brand, capture, ...order } = params;
    return this.create({
      ...order,
      payment: {
        method: paymentMethod ?? "CREDIT_CARD",
        cardToken,
        brand,
        capture,
      },
    });
  }
}
