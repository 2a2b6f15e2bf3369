// ---------------------------------------------------------------------------
// Barte SDK – Charge, PIX charge and refund records
// ---------------------------------------------------------------------------
// A charge decodes into one of two variants, chosen from `paymentMethod`
// before any variant field is read:
//   - kind "pix"    → paymentMethod "PIX", carries the QR-code fields
//   - kind "charge" → every other payment method
// The refund endpoint answers with the refunded charge; it decodes into a
// third record, kind "refund".
// ---------------------------------------------------------------------------

import { z } from "zod";
import { optional, timestamp, type Decoder } from "../decoding";
import { chargeCustomerSchema, type ChargeCustomer } from "./customer";
import {
  chargeStatusSchema,
  nonPixPaymentMethodSchema,
  paymentMethodSchema,
  type ChargeStatus,
  type NonPixPaymentMethod,
  type PaymentMethod,
} from "./enums";

/** Fields every charge-shaped record shares. */
export interface ChargeFields {
  readonly uuid: string;
  readonly title: string;
  readonly description?: string | null;
  /** Amount in decimal currency units (BRL), e.g. `10.5`. */
  readonly value: number;
  readonly status: ChargeStatus;
  readonly customer: ChargeCustomer;
  readonly expirationDate: Date;
  readonly paidDate?: Date | null;
  readonly authorizationCode?: string | null;
  readonly authorizationNsu?: string | null;
  readonly installments?: number | null;
  /** Per-installment amount when the charge is split. */
  readonly installmentAmount?: number | null;
}

/** A charge paid by any method other than PIX. */
export interface StandardChargeData extends ChargeFields {
  readonly kind: "charge";
  readonly paymentMethod: NonPixPaymentMethod;
}

/** A PIX charge; the QR fields appear once the server has issued them. */
export interface PixChargeData extends ChargeFields {
  readonly kind: "pix";
  readonly paymentMethod: "PIX";
  /** PIX copy-and-paste payload (EMV string). */
  readonly pixCode?: string | null;
  /** URL of the rendered QR-code image. */
  readonly pixQRCodeImage?: string | null;
}

export type ChargeData = StandardChargeData | PixChargeData;

/** Result of a refund: the refunded charge, tagged as a refund. */
export interface Refund extends ChargeFields {
  readonly kind: "refund";
  readonly paymentMethod: PaymentMethod;
  /** The charge this refund belongs to. */
  readonly chargeUuid: string;
}

/** QR-code data extracted from a PIX charge. */
export interface PixQrCode {
  readonly chargeUuid: string;
  /** PIX copy-and-paste payload. */
  readonly qrCode: string;
  readonly qrCodeImage?: string | null;
}

const chargeFields = {
  uuid: z.string(),
  title: z.string(),
  description: optional(z.string()),
  value: z.number(),
  status: chargeStatusSchema,
  customer: chargeCustomerSchema,
  expirationDate: timestamp,
  paidDate: optional(timestamp),
  authorizationCode: optional(z.string()),
  authorizationNsu: optional(z.string()),
  installments: optional(z.number().int()),
  installmentAmount: optional(z.number()),
};

const pixQrFields = {
  pixCode: optional(z.string()),
  pixQRCodeImage: optional(z.string()),
};

const standardChargeWire = z.object({
  ...chargeFields,
  paymentMethod: nonPixPaymentMethodSchema,
});

const pixChargeWire = z.object({
  ...chargeFields,
  ...pixQrFields,
  paymentMethod: z.literal("PIX"),
});

export const chargeSchema: Decoder<ChargeData> = z
  .discriminatedUnion("paymentMethod", [standardChargeWire, pixChargeWire])
  .transform((charge): ChargeData =>
    charge.paymentMethod === "PIX"
      ? { ...charge, kind: "pix" }
      : { ...charge, kind: "charge" },
  );

export const refundSchema: Decoder<Refund> = z
  .object({
    ...chargeFields,
    paymentMethod: paymentMethodSchema,
  })
  .transform((charge): Refund => ({
    ...charge,
    kind: "refund",
    chargeUuid: charge.uuid,
  }));
