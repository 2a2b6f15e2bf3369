import { z } from "zod";
import { timestamp, type Decoder } from "../decoding";

/**
 * A tokenized card. Created by `POST /v2/cards` and read-only afterwards;
 * pass `uuid` as the card token when placing a card order.
 */
export interface CardToken {
  readonly uuid: string;
  readonly status: string;
  readonly createdAt: Date;
  readonly brand: string;
  readonly cardHolderName: string;
  readonly cvvChecked: boolean;
  readonly fingerprint: string;
  readonly first6digits: string;
  readonly last4digits: string;
  readonly buyerId: string;
  readonly expirationMonth: string;
  readonly expirationYear: string;
  readonly cardId: string;
}

export const cardTokenSchema: Decoder<CardToken> = z.object({
  uuid: z.string(),
  status: z.string(),
  createdAt: timestamp,
  brand: z.string(),
  cardHolderName: z.string(),
  cvvChecked: z.boolean(),
  fingerprint: z.string(),
  first6digits: z.string(),
  last4digits: z.string(),
  buyerId: z.string(),
  expirationMonth: z.string(),
  expirationYear: z.string(),
  cardId: z.string(),
});
