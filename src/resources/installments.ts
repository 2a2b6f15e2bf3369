import { API_VERSION_PREFIX } from "../config";
import { decode } from "../decoding";
import { bodyOf, type Transport } from "../http";
import {
  installmentOptionsSchema,
  type InstallmentOption,
} from "../models/installment";
import type {
  ListInstallmentsParams,
  SimulateInstallmentsParams,
} from "../types";

/** Installment simulation for card payments. */
export class InstallmentsResource {
  constructor(private readonly transport: Transport) {}

  /** Installment plans for `amount`, up to `maxInstallments`. */
  async list(params: ListInstallmentsParams): Promise<readonly InstallmentOption[]> {
    const result = await this.transport.send(
      "GET",
      `${API_VERSION_PREFIX}/orders/installments-payment`,
      { amount: params.amount, maxInstallments: params.maxInstallments },
    );
    return decode(installmentOptionsSchema, bodyOf(result), "InstallmentOptions");
  }

  /** Installment plans for `amount` on a given card brand. */
  async simulate(
    params: SimulateInstallmentsParams,
  ): Promise<readonly InstallmentOption[]> {
    const result = await this.transport.send(
      "GET",
      `${API_VERSION_PREFIX}/simulate/installments`,
      { amount: params.amount, brand: params.brand },
    );
    return decode(installmentOptionsSchema, bodyOf(result), "InstallmentOptions");
  }
}
