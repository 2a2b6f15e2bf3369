// ---------------------------------------------------------------------------
// Barte SDK – Request & Client Option Types
// ---------------------------------------------------------------------------
// Input shapes accepted by the resource methods. Response records live in
// ./models; entity methods in ./entities.
// ---------------------------------------------------------------------------

import type { Transport } from "./http";
import type { Logger } from "./logger";
import type {
  CardPaymentMethod,
  ChargeStatus,
  PaymentMethod,
} from "./models/enums";

// ── Client Config ──────────────────────────────────────────────────────────
/** Options for constructing a BarteClient. */
export interface BarteClientOptions {
  /** Your Barte API key. **Never expose in client-side code.** */
  apiKey: string;
  /**
   * `"production"` or `"sandbox"`; anything else is rejected with a
   * ConfigurationError.
   * @default "production"
   */
  environment?: string;
  /** pino logger to write to. Defaults to a silent SDK logger. */
  logger?: Logger;
  /** Replace the fetch-based transport (tests, proxies). */
  transport?: Transport;
  /**
   * Register this client as the active client used by entities that were
   * decoded without one.
   * @default true
   */
  registerAsActive?: boolean;
}

// ── Orders ─────────────────────────────────────────────────────────────────
/** Customer data sent with an order. */
export interface OrderCustomerParams {
  /** CPF or CNPJ, digits only or formatted. */
  document: string;
  /** Document kind, e.g. `"CPF"` or `"CNPJ"`. */
  type: string;
  /** Country of the document for foreign customers. */
  documentCountry?: string;
  name: string;
  email: string;
  phone: string;
  alternativeEmail?: string;
}

/** How the order is to be paid. */
export interface OrderPaymentParams {
  method: PaymentMethod;
  /** Card token uuid from `cards.createToken`, for card methods. */
  cardToken?: string;
  /** Card brand, e.g. `"visa"`. */
  brand?: string;
  /** Capture immediately (card methods only). */
  capture?: boolean;
}

/** Parameters for `orders.create`. */
export interface CreateOrderParams {
  title: string;
  description?: string;
  /** Amount in decimal currency units (BRL). */
  value: number;
  /** @default 1 */
  installments?: number;
  /** A `Date` is sent as its UTC calendar day (`YYYY-MM-DD`). */
  startDate: Date | string;
  payment: OrderPaymentParams;
  customer: OrderCustomerParams;
  /**
   * Caller-chosen key; the server uses it to deduplicate repeated
   * submissions. Reuse the same key when resubmitting the same order.
   */
  idempotencyKey: string;
  /** URL the server notifies on status changes. */
  urlCallBack?: string;
}

/** Parameters for `orders.createPix`. */
export type CreatePixOrderParams = Omit<CreateOrderParams, "payment">;

/** Parameters for `orders.createWithCardToken`. */
export interface CreateCardOrderParams extends Omit<CreateOrderParams, "payment"> {
  /** @default "CREDIT_CARD" */
  paymentMethod?: CardPaymentMethod;
  brand?: string;
  capture?: boolean;
}

// ── Charges ────────────────────────────────────────────────────────────────
/** Filters for `charges.list`. All optional; none returns the first page. */
export interface ListChargesParams {
  customerDocument?: string;
  status?: ChargeStatus;
  paymentMethod?: PaymentMethod;
  /** Lower bound on the charge date. */
  startDate?: Date | string;
  /** Upper bound on the charge date. */
  endDate?: Date | string;
  /** Zero-based page index. */
  page?: number;
  size?: number;
  /** Spring sort descriptor, e.g. `"createdAt,desc"`. */
  sort?: string;
}

export interface RefundOptions {
  /** Flag the refund as fraud. @default false */
  asFraud?: boolean;
}

// ── Buyers ─────────────────────────────────────────────────────────────────
/** Parameters for `buyers.create`. */
export interface CreateBuyerParams {
  document: string;
  name: string;
  email: string;
  phone: string;
  countryCode?: string;
  alternativeEmail?: string;
}

/** Filters for `buyers.list`. */
export interface ListBuyersParams {
  document?: string;
  name?: string;
  email?: string;
  page?: number;
  size?: number;
  sort?: string;
}

// ── Cards ──────────────────────────────────────────────────────────────────
/** Card data for `cards.createToken`. */
export interface CreateCardTokenParams {
  holderName: string;
  number: string;
  cvv: string;
  /** `MM/YYYY`. */
  expiration: string;
  /** Buyer the card belongs to. */
  buyerUuid: string;
}

// ── Installments ───────────────────────────────────────────────────────────
export interface SimulateInstallmentsParams {
  amount: number;
  /** Card brand, e.g. `"visa"`. */
  brand: string;
}

export interface ListInstallmentsParams {
  amount: number;
  maxInstallments: number;
}
