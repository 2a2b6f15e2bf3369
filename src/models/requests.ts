// ---------------------------------------------------------------------------
// Barte SDK – Request encoding
// ---------------------------------------------------------------------------
// Typed parameters → wire payloads and query maps. Keys whose value is
// `undefined` are left out of bodies by JSON.stringify and out of query
// strings by the transport.
// ---------------------------------------------------------------------------

import { RequestValidationError } from "../errors";
import type { QueryParams } from "../http";
import type {
  CreateBuyerParams,
  CreateCardTokenParams,
  CreateOrderParams,
  ListBuyersParams,
  ListChargesParams,
  RefundOptions,
} from "../types";

/** `Date` → `YYYY-MM-DD` (UTC); strings pass through unchanged. */
export function formatDate(date: Date | string): string {
  return typeof date === "string" ? date : date.toISOString().slice(0, 10);
}

export interface OrderRequestBody {
  title: string;
  description?: string;
  value: number;
  installments: number;
  startDate: string;
  payment: {
    method: string;
    cardToken?: string;
    brand?: string;
    capture?: boolean;
  };
  customer: {
    document: string;
    type: string;
    documentCountry?: string;
    name: string;
    email: string;
    phone: string;
    alternativeEmail?: string;
  };
  idempotencyKey: string;
  urlCallBack?: string;
}

/**
 * @throws {RequestValidationError} when the idempotency key is blank or the
 * installment count is not a positive integer.
 */
export function encodeOrderRequest(params: CreateOrderParams): OrderRequestBody {
  if (params.idempotencyKey.trim() === "") {
    throw new RequestValidationError(
      "An idempotencyKey is required to create an order.",
    );
  }

  const installments = params.installments ?? 1;
  if (!Number.isInteger(installments) || installments < 1) {
    throw new RequestValidationError(
      `installments must be a positive integer, received ${installments}`,
    );
  }

  const { payment, customer } = params;
  return {
    title: params.title,
    description: params.description,
    value: params.value,
    installments,
    startDate: formatDate(params.startDate),
    payment: {
      method: payment.method,
      cardToken: payment.cardToken,
      brand: payment.brand,
      capture: payment.capture,
    },
    customer: {
      document: customer.document,
      type: customer.type,
      documentCountry: customer.documentCountry,
      name: customer.name,
      email: customer.email,
      phone: customer.phone,
      alternativeEmail: customer.alternativeEmail,
    },
    idempotencyKey: params.idempotencyKey,
    urlCallBack: params.urlCallBack,
  };
}

export function encodeRefundRequest(options: RefundOptions = {}): { asFraud: boolean } {
  return { asFraud: options.asFraud ?? false };
}

export function encodeBuyerRequest(params: CreateBuyerParams): CreateBuyerParams {
  return {
    document: params.document,
    name: params.name,
    email: params.email,
    phone: params.phone,
    countryCode: params.countryCode,
    alternativeEmail: params.alternativeEmail,
  };
}

export function encodeCardTokenRequest(
  params: CreateCardTokenParams,
): CreateCardTokenParams {
  return {
    holderName: params.holderName,
    number: params.number,
    cvv: params.cvv,
    expiration: params.expiration,
    buyerUuid: params.buyerUuid,
  };
}

export function encodeChargeFilters(params: ListChargesParams = {}): QueryParams {
  return {
    customerDocument: params.customerDocument,
    status: params.status,
    paymentMethod: params.paymentMethod,
    startDate: params.startDate === undefined ? undefined : formatDate(params.startDate),
    endDate: params.endDate === undefined ? undefined : formatDate(params.endDate),
    page: params.page,
    size: params.size,
    sort: params.sort,
  };
}

export function encodeBuyerFilters(params: ListBuyersParams = {}): QueryParams {
  return {
    document: params.document,
    name: params.name,
    email: params.email,
    page: params.page,
    size: params.size,
    sort: params.sort,
  };
}
