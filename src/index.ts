// ---------------------------------------------------------------------------
// Barte SDK – Public API Surface
// ---------------------------------------------------------------------------
// Everything re-exported here is part of the public contract.
// ---------------------------------------------------------------------------

// ── Main client ────────────────────────────────────────────────────────────
export { BarteClient } from "./client";

// ── Configuration ──────────────────────────────────────────────────────────
export {
  API_VERSION_PREFIX,
  AUTH_HEADER_NAME,
  BASE_URLS,
  ENVIRONMENTS,
  configFromEnv,
  resolveConfig,
} from "./config";
export type { ClientConfig, Environment } from "./config";

// ── Error classes ──────────────────────────────────────────────────────────
export {
  BarteError,
  ConfigurationError,
  ConnectionError,
  DecodingError,
  RemoteApiError,
  RequestValidationError,
  UninitializedClientError,
  errorCodeFromStatus,
} from "./errors";
export type { BarteErrorCode, DecodingIssue } from "./errors";

// ── Transport ──────────────────────────────────────────────────────────────
export { HttpClient, NO_CONTENT } from "./http";
export type {
  HttpMethod,
  JsonValue,
  QueryParams,
  Transport,
  TransportResult,
} from "./http";

// ── Entities & decoding ────────────────────────────────────────────────────
export {
  decodeBuyer,
  decodeCardToken,
  decodeCharge,
  decodeOrder,
  decodeRefund,
  isPixCharge,
} from "./entities";
export type {
  Cancelable,
  Charge,
  ChargeOperations,
  ClientBinding,
  Order,
  PixCharge,
  PixQrCodeSource,
  Refundable,
  StandardCharge,
} from "./entities";
export {
  CHARGE_STATUSES,
  PAYMENT_METHODS,
} from "./models/enums";
export type {
  Buyer,
  CardPaymentMethod,
  CardToken,
  ChargeCustomer,
  ChargeData,
  ChargeFields,
  ChargeStatus,
  InstallmentOption,
  NonPixPaymentMethod,
  OrderCustomer,
  OrderData,
  Page,
  PaymentMethod,
  PixChargeData,
  PixQrCode,
  Refund,
  SortInfo,
  StandardChargeData,
} from "./models";

// ── Active-client registry ─────────────────────────────────────────────────
export {
  clearActiveClient,
  getActiveClient,
  hasActiveClient,
  registerActiveClient,
} from "./registry";

// ── Request types ──────────────────────────────────────────────────────────
export type {
  BarteClientOptions,
  CreateBuyerParams,
  CreateCardOrderParams,
  CreateCardTokenParams,
  CreateOrderParams,
  CreatePixOrderParams,
  ListBuyersParams,
  ListChargesParams,
  ListInstallmentsParams,
  OrderCustomerParams,
  OrderPaymentParams,
  RefundOptions,
  SimulateInstallmentsParams,
} from "./types";

export { SDK_VERSION } from "./version";
