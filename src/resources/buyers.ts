import { API_VERSION_PREFIX } from "../config";
import { decode } from "../decoding";
import { bodyOf, type Transport } from "../http";
import { buyerSchema, type Buyer } from "../models/buyer";
import { pageOf, type Page } from "../models/page";
import { encodeBuyerFilters, encodeBuyerRequest } from "../models/requests";
import type { CreateBuyerParams, ListBuyersParams } from "../types";

const buyerPageSchema = pageOf(buyerSchema);

/** Resource class for Barte buyers. */
export class BuyersResource {
  constructor(private readonly transport: Transport) {}

  async create(params: CreateBuyerParams): Promise<Buyer> {
    const result = await this.transport.send(
      "POST",
      `${API_VERSION_PREFIX}/buyers`,
      undefined,
      encodeBuyerRequest(params),
    );
    return decode(buyerSchema, bodyOf(result), "Buyer");
  }

  /** List buyers; without filters the first unfiltered page is returned. */
  async list(params: ListBuyersParams = {}): Promise<Page<Buyer>> {
    const result = await this.transport.send(
      "GET",
      `${API_VERSION_PREFIX}/buyers`,
      encodeBuyerFilters(params),
    );
    return decode(buyerPageSchema, bodyOf(result), "Page<Buyer>");
  }
}
