// ---------------------------------------------------------------------------
// Barte SDK – Entity binding
// ---------------------------------------------------------------------------
// Decoded records gain convenience methods (`charge.refund()`,
// `order.cancel()`, `pix.getQrCode()`) through a ClientBinding: a function
// that returns the charge operations to call.
//
//   - Records returned by a BarteClient resource are bound to that client.
//   - Records built with the exported decode* helpers are bound to the
//     active-client registry and resolve it at call time.
// ---------------------------------------------------------------------------

import { decode } from "./decoding";
import { buyerSchema, type Buyer } from "./models/buyer";
import { cardTokenSchema, type CardToken } from "./models/card-token";
import {
  chargeSchema,
  refundSchema,
  type ChargeData,
  type PixChargeData,
  type PixQrCode,
  type Refund,
  type StandardChargeData,
} from "./models/charge";
import { orderSchema, type OrderData } from "./models/order";
import { getActiveClient } from "./registry";
import type { RefundOptions } from "./types";

/** What an entity needs from a client to act on itself. */
export interface ChargeOperations {
  refund(uuid: string, options?: RefundOptions): Promise<Refund>;
  cancel(uuid: string): Promise<void>;
  getPixQrCode(uuid: string): Promise<PixQrCode>;
}

/** Resolves the client an entity acts through. May throw UninitializedClientError. */
export type ClientBinding = () => ChargeOperations;

/** Binding that looks the client up in the active-client registry. */
export const activeClientBinding: ClientBinding = () => getActiveClient();

// ── Capabilities ───────────────────────────────────────────────────────────

export interface Refundable<R = Refund> {
  refund(options?: RefundOptions): Promise<R>;
}

export interface Cancelable {
  cancel(): Promise<void>;
}

export interface PixQrCodeSource {
  /** Re-fetch the charge and return its QR-code data. */
  getQrCode(): Promise<PixQrCode>;
}

// ── Entity types ───────────────────────────────────────────────────────────

export type StandardCharge = StandardChargeData & Refundable & Cancelable;
export type PixCharge = PixChargeData & Refundable & Cancelable & PixQrCodeSource;
export type Charge = StandardCharge | PixCharge;

/**
 * An order. `cancel()` and `refund()` act on each of its charges in turn,
 * stopping at the first failure.
 */
export type Order = Omit<OrderData, "charges"> & {
  readonly charges: readonly Charge[];
} & Cancelable &
  Refundable<Refund[]>;

export function isPixCharge(charge: Charge): charge is PixCharge {
  return charge.kind === "pix";
}

// ── Binding ────────────────────────────────────────────────────────────────

export function bindCharge(data: ChargeData, binding: ClientBinding): Charge {
  const refund = async (options?: RefundOptions): Promise<Refund> =>
    binding().refund(data.uuid, options);
  const cancel = async (): Promise<void> => binding().cancel(data.uuid);

  if (data.kind === "pix") {
    return {
      ...data,
      refund,
      cancel,
      getQrCode: async () => binding().getPixQrCode(data.uuid),
    };
  }
  return { ...data, refund, cancel };
}

export function bindOrder(data: OrderData, binding: ClientBinding): Order {
  const charges = data.charges.map((charge) => bindCharge(charge, binding));

  return {
    ...data,
    charges,
    cancel: async () => {
      for (const charge of charges) {
        await charge.cancel();
      }
    },
    refund: async (options?: RefundOptions) => {
      const refunds: Refund[] = [];
      for (const charge of charges) {
        refunds.push(await charge.refund(options));
      }
      return refunds;
    },
  };
}

// ── Standalone decoding ────────────────────────────────────────────────────
// Entities built here resolve their client through the registry.

export function decodeCharge(raw: unknown): Charge {
  return bindCharge(decode(chargeSchema, raw, "Charge"), activeClientBinding);
}

export function decodeOrder(raw: unknown): Order {
  return bindOrder(decode(orderSchema, raw, "Order"), activeClientBinding);
}

export function decodeRefund(raw: unknown): Refund {
  return decode(refundSchema, raw, "Refund");
}

export function decodeBuyer(raw: unknown): Buyer {
  return decode(buyerSchema, raw, "Buyer");
}

export function decodeCardToken(raw: unknown): CardToken {
  return decode(cardTokenSchema, raw, "CardToken");
}
