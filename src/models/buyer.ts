import { z } from "zod";
import { optional, type Decoder } from "../decoding";

/** A buyer registered with `POST /v2/buyers`. */
export interface Buyer {
  readonly uuid: string;
  readonly document: string;
  readonly name: string;
  readonly email: string;
  readonly phone: string;
  readonly countryCode?: string | null;
  readonly alternativeEmail?: string | null;
}

export const buyerSchema: Decoder<Buyer> = z.object({
  uuid: z.string(),
  document: z.string(),
  name: z.string(),
  email: z.string(),
  phone: z.string(),
  countryCode: optional(z.string()),
  alternativeEmail: optional(z.string()),
});
