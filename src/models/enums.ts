import { z } from "zod";

/** Payment methods accepted by the v2 API. */
export const PAYMENT_METHODS = [
  "PIX",
  "BANK_SLIP",
  "CREDIT_CARD",
  "CREDIT_CARD_EARLY_BUYER",
  "CREDIT_CARD_EARLY_SELLER",
  "CREDIT_CARD_EARLY_MIXED",
  "DEBIT_CARD",
] as const;

export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

/** Every method except PIX; these charges carry no QR code. */
export const NON_PIX_PAYMENT_METHODS = [
  "BANK_SLIP",
  "CREDIT_CARD",
  "CREDIT_CARD_EARLY_BUYER",
  "CREDIT_CARD_EARLY_SELLER",
  "CREDIT_CARD_EARLY_MIXED",
  "DEBIT_CARD",
] as const satisfies readonly Exclude<PaymentMethod, "PIX">[];

export type NonPixPaymentMethod = (typeof NON_PIX_PAYMENT_METHODS)[number];

export type CardPaymentMethod = Extract<
  PaymentMethod,
  `CREDIT_CARD${string}` | "DEBIT_CARD"
>;

/**
 * Charge lifecycle as reported by the server. The SDK never moves a charge
 * between states itself; re-fetch to observe a transition.
 */
export const CHARGE_STATUSES = [
  "CREATED",
  "PENDING",
  "SCHEDULED",
  "PRE_AUTHORIZED",
  "PAID",
  "LATE",
  "REFUND",
  "PARTIALLY_REFUNDED",
  "CANCELED",
  "FAILED",
  "CHARGEBACK",
  "DISPUTE",
  "ABANDONED",
] as const;

export type ChargeStatus = (typeof CHARGE_STATUSES)[number];

export const paymentMethodSchema = z.enum(PAYMENT_METHODS);
export const nonPixPaymentMethodSchema = z.enum(NON_PIX_PAYMENT_METHODS);
export const chargeStatusSchema = z.enum(CHARGE_STATUSES);
