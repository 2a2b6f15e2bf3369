import { z } from "zod";
import { optional, timestamp, type Decoder } from "../decoding";
import { chargeSchema, type ChargeData } from "./charge";
import { orderCustomerSchema, type OrderCustomer } from "./customer";
import { paymentMethodSchema, type PaymentMethod } from "./enums";

/** An order as returned by `POST /v2/orders`. */
export interface OrderData {
  readonly uuid: string;
  readonly status: string;
  readonly title: string;
  readonly description?: string | null;
  readonly value: number;
  readonly installments: number;
  readonly startDate: Date;
  /** Payment method the order was placed with. */
  readonly payment: PaymentMethod;
  readonly customer: OrderCustomer;
  /** The caller-supplied key the server deduplicated on. */
  readonly idempotencyKey: string;
  /** Charge attempts generated for this order, in server order. */
  readonly charges: readonly ChargeData[];
}

export const orderSchema: Decoder<OrderData> = z.object({
  uuid: z.string(),
  status: z.string(),
  title: z.string(),
  description: optional(z.string()),
  value: z.number(),
  installments: z.number().int(),
  startDate: timestamp,
  payment: paymentMethodSchema,
  customer: orderCustomerSchema,
  idempotencyKey: z.string(),
  charges: z.array(chargeSchema),
});
