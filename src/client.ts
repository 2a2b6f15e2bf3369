// ---------------------------------------------------------------------------
// Barte SDK – Main Client
// ---------------------------------------------------------------------------
// The primary entry point for SDK consumers: `barte.orders.create(…)`,
// `barte.charges.retrieve(…)`. Resources are lazy properties sharing one
// transport.
// ---------------------------------------------------------------------------

import { configFromEnv, resolveConfig, type ClientConfig } from "./config";
import type { ClientBinding } from "./entities";
import { HttpClient, type Transport } from "./http";
import { createLogger, type Logger } from "./logger";
import { registerActiveClient } from "./registry";
import { BuyersResource } from "./resources/buyers";
import { CardsResource } from "./resources/cards";
import { ChargesResource } from "./resources/charges";
import { InstallmentsResource } from "./resources/installments";
import { OrdersResource } from "./resources/orders";
import type { BarteClientOptions } from "./types";

/**
 * The Barte SDK client.
 *
 * @example
 * ```ts
 * import { BarteClient } from "barte-node";
 *
 * const barte = new BarteClient({ apiKey: "your-api-key", environment: "sandbox" });
 *
 * const charge = await barte.charges.retrieve("c1");
 * await charge.refund();
 * ```
 *
 * @example
 * ```ts
 * // List charges for one customer
 * const page = await barte.charges.list({ customerDocument: "00000000000" });
 * console.log(`Found ${page.totalElements} charges`);
 * ```
 */
export class BarteClient {
  /** Resolved configuration: environment, base URL and auth header. */
  readonly config: ClientConfig;
  readonly logger: Logger;
  private readonly transport: Transport;
  private readonly binding: ClientBinding = () => this.charges;

  // ── Resource instances (lazy-initialised) ────────────────────────────────
  private _orders?: OrdersResource;
  private _charges?: ChargesResource;
  private _buyers?: BuyersResource;
  private _cards?: CardsResource;
  private _installments?: InstallmentsResource;

  /**
   * Create a new Barte client and, unless `registerAsActive` is `false`,
   * make it the active client for entities decoded without one.
   *
   * @throws {ConfigurationError} for an empty API key or unknown environment.
   */
  constructor(options: BarteClientOptions) {
    this.config = resolveConfig(options);
    this.logger = (options.logger ?? createLogger()).child({
      environment: this.config.environment,
    });
    this.transport = options.transport ?? new HttpClient(this.config, this.logger);

    if (options.registerAsActive ?? true) {
      registerActiveClient(this.charges);
    }

    this.logger.debug({ baseUrl: this.config.baseUrl }, "barte client initialised");
  }

  /**
   * Build a client from `BARTE_API_KEY` and `BARTE_ENVIRONMENT`.
   */
  static fromEnv(
    env: Record<string, string | undefined> = process.env,
    options: Omit<BarteClientOptions, "apiKey" | "environment"> = {},
  ): BarteClient {
    const { apiKey, environment } = configFromEnv(env);
    return new BarteClient({ ...options, apiKey, environment });
  }

  // ── Resource accessors ───────────────────────────────────────────────────

  /** Orders: create an order (card, PIX or bank slip). */
  get orders(): OrdersResource {
    if (!this._orders) {
      this._orders = new OrdersResource(this.transport, this.binding);
    }
    return this._orders;
  }

  /** Charges: retrieve, list, cancel, refund, PIX QR codes. */
  get charges(): ChargesResource {
    if (!this._charges) {
      this._charges = new ChargesResource(this.transport);
    }
    return this._charges;
  }

  get buyers(): BuyersResource {
    if (!this._buyers) {
      this._buyers = new BuyersResource(this.transport);
    }
    return this._buyers;
  }

  /** Card tokenization. */
  get cards(): CardsResource {
    if (!this._cards) {
      this._cards = new CardsResource(this.transport);
    }
    return this._cards;
  }

  get installments(): InstallmentsResource {
    if (!this._installments) {
      this._installments = new InstallmentsResource(this.transport);
    }
    return this._installments;
  }
}
