// ---------------------------------------------------------------------------
// Barte SDK – Customer snapshots
// ---------------------------------------------------------------------------
// The customer copy the API embeds in charges and orders. Buyers (the
// standalone resource) live in ./buyer.ts.
// ---------------------------------------------------------------------------

import { z } from "zod";
import { optional, type Decoder } from "../decoding";

/** Customer embedded in a charge. */
export interface ChargeCustomer {
  /** Server-assigned identifier; absent on some API answers. */
  readonly uuid?: string | null;
  /** Tax identifier (CPF or CNPJ). */
  readonly document: string;
  /** Document kind, e.g. `"CPF"` or `"CNPJ"`. */
  readonly type?: string | null;
  readonly name: string;
  readonly email: string;
  readonly phone: string;
  readonly alternativeEmail?: string | null;
}

/** Customer embedded in an order. */
export interface OrderCustomer {
  readonly document: string;
  readonly type?: string | null;
  /** ISO country of the document, for non-Brazilian customers. */
  readonly documentCountry?: string | null;
  readonly name: string;
  readonly email: string;
  readonly phone: string;
  readonly alternativeEmail?: string | null;
}

export const chargeCustomerSchema: Decoder<ChargeCustomer> = z.object({
  uuid: optional(z.string()),
  document: z.string(),
  type: optional(z.string()),
  name: z.string(),
  email: z.string(),
  phone: z.string(),
  alternativeEmail: optional(z.string()),
});

export const orderCustomerSchema: Decoder<OrderCustomer> = z.object({
  document: z.string(),
  type: optional(z.string()),
  documentCountry: optional(z.string()),
  name: z.string(),
  email: z.string(),
  phone: z.string(),
  alternativeEmail: optional(z.string()),
});
