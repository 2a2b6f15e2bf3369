import { API_VERSION_PREFIX } from "../config";
import { decode } from "../decoding";
import { bodyOf, type Transport } from "../http";
import { cardTokenSchema, type CardToken } from "../models/card-token";
import { encodeCardTokenRequest } from "../models/requests";
import type { CreateCardTokenParams } from "../types";

/**
 * Resource class for card tokenization.
 *
 * Raw card data goes to the API once; keep only the returned token.
 */
export class CardsResource {
  constructor(private readonly transport: Transport) {}

  async createToken(params: CreateCardTokenParams): Promise<CardToken> {
    const result = await this.transport.send(
      "POST",
      `${API_VERSION_PREFIX}/cards`,
      undefined,
      encodeCardTokenRequest(params),
    );
    return decode(cardTokenSchema, bodyOf(result), "CardToken");
  }
}
