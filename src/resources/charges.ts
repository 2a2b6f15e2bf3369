// ---------------------------------------------------------------------------
// Barte SDK – Charges Resource
// ---------------------------------------------------------------------------
// Retrieve, list, cancel and refund charges; list refunds; read PIX QR codes.
// Charges returned here are bound to this resource, so `charge.refund()`
// goes through the same client that fetched it.
// ---------------------------------------------------------------------------

import { z } from "zod";
import { API_VERSION_PREFIX } from "../config";
import { decode } from "../decoding";
import {
  bindCharge,
  type Charge,
  type ChargeOperations,
  type ClientBinding,
} from "../entities";
import { DecodingError } from "../errors";
import { bodyOf, type Transport } from "../http";
import {
  chargeSchema,
  refundSchema,
  type PixQrCode,
  type Refund,
} from "../models/charge";
import { pageOf, type Page } from "../models/page";
import { encodeChargeFilters, encodeRefundRequest } from "../models/requests";
import type { ListChargesParams, RefundOptions } from "../types";

const chargePageSchema = pageOf(chargeSchema);
const refundListSchema = z.array(refundSchema);

/** Path of a single charge. */
function chargePath(uuid: string): string {
  return `${API_VERSION_PREFIX}/charges/${encodeURIComponent(uuid)}`;
}

/**
 * Resource class for Barte charges.
 *
 * @example
 * ```ts
 * const charge = await barte.charges.retrieve("c1");
 * if (charge.kind === "pix") {
 *   const { qrCode } = await charge.getQrCode();
 * }
 * ```
 */
export class ChargesResource implements ChargeOperations {
  private readonly binding: ClientBinding = () => this;

  constructor(private readonly transport: Transport) {}

  /**
   * Retrieve a single charge.
   *
   * @throws {RemoteApiError} with `not_found_error` if the charge does not exist.
   */
  async retrieve(uuid: string): Promise<Charge> {
    const result = await this.transport.send("GET", chargePath(uuid));
    return bindCharge(decode(chargeSchema, bodyOf(result), "Charge"), this.binding);
  }

  /**
   * List charges. Without filters the server's first, unfiltered page is
   * returned.
   */
  async list(params: ListChargesParams = {}): Promise<Page<Charge>> {
    const result = await this.transport.send(
      "GET",
      `${API_VERSION_PREFIX}/charges`,
      encodeChargeFilters(params),
    );
    const page = decode(chargePageSchema, bodyOf(result), "Page<Charge>");
    return {
      ...page,
      content: page.content.map((charge) => bindCharge(charge, this.binding)),
    };
  }

  /**
   * Cancel a charge. Resolves once the server accepts; whether the charge can
   * still be canceled is decided remotely.
   */
  async cancel(uuid: string): Promise<void> {
    await this.transport.send("DELETE", chargePath(uuid));
  }

  /** Refund a charge. `asFraud` defaults to `false`. */
  async refund(uuid: string, options: RefundOptions = {}): Promise<Refund> {
    const result = await this.transport.send(
      "PATCH",
      `${chargePath(uuid)}/refund`,
      undefined,
      encodeRefundRequest(options),
    );
    return decode(refundSchema, bodyOf(result), "Refund");
  }

  /** Refunds already issued against a charge, in server order. */
  async listRefunds(uuid: string): Promise<Refund[]> {
    const result = await this.transport.send("GET", `${chargePath(uuid)}/refunds`);
    const refunds = decode(refundListSchema, bodyOf(result), "Refund[]");
    return refunds.map((refund) => ({ ...refund, chargeUuid: uuid }));
  }

  /**
   * Re-fetch a PIX charge and extract its QR code.
   *
   * @throws {DecodingError} if the charge is not PIX or has no QR code yet.
   */
  async getPixQrCode(uuid: string): Promise<PixQrCode> {
    const result = await this.transport.send("GET", chargePath(uuid));
    const charge = decode(chargeSchema, bodyOf(result), "Charge");

    if (charge.kind !== "pix") {
      throw new DecodingError("PixQrCode", [
        {
          field: "paymentMethod",
          message: `Expected a PIX charge, received ${charge.paymentMethod}`,
        },
      ]);
    }
    if (charge.pixCode === undefined || charge.pixCode === null) {
      throw new DecodingError("PixQrCode", [
        { field: "pixCode", message: "Charge has no PIX code" },
      ]);
    }

    return {
      chargeUuid: charge.uuid,
      qrCode: charge.pixCode,
      qrCodeImage: charge.pixQRCodeImage,
    };
  }
}
