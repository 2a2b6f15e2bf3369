// ---------------------------------------------------------------------------
// Barte SDK – Integration Tests
// ---------------------------------------------------------------------------
// Tests the SDK as a consumer would use it: creating a BarteClient and
// calling resource methods end-to-end through the full call stack, with
// `fetch` answered in-process by a small routing table.
// ---------------------------------------------------------------------------

import { afterEach, describe, test, expect, vi } from 'vitest';
import type { Mock } from 'vitest';
import {
    BarteClient,
    ConnectionError,
    RemoteApiError,
    clearActiveClient,
    decodeCharge,
    hasActiveClient,
    isPixCharge,
} from '../../src/index';
import {
    buyerJson,
    cardChargeJson,
    cardTokenJson,
    orderJson,
    pageJson,
    pixChargeJson,
} from '../helpers/fixtures';

type Handler = (body: unknown, url: URL) => Response;

function json(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json' },
    });
}

/** Route `METHOD /path` to a handler; anything else answers 404. */
function setupMockApi(handlers: Record<string, Handler>): Mock<typeof fetch> {
    const fetchMock = vi.fn<typeof fetch>(async (input, init) => {
        const url = new URL(String(input));
        const method = init?.method ?? 'GET';
        const body: unknown = typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
        const handler = handlers[`${method} ${url.pathname}`];

        if (handler) return handler(body, url);
        return json({ message: 'Not Found' }, 404);
    });
    vi.stubGlobal('fetch', fetchMock);
    return fetchMock;
}

function createClient(): BarteClient {
    return new BarteClient({ apiKey: 'test-key', environment: 'sandbox' });
}

const customer = {
    document: '00000000000',
    type: 'CPF',
    name: 'John Doe',
    email: 'john@example.com',
    phone: '11999999999',
};

describe('SDK Integration – End-to-End Workflows', () => {
    afterEach(() => {
        clearActiveClient();
    });

    // ── Card payment flow ────────────────────────────────────────────────

    describe('card payment flow', () => {
        test('should register buyer → tokenize card → place order → refund', async () => {
            const fetchMock = setupMockApi({
                'POST /v2/buyers': (body) => {
                    expect(body).toMatchObject({ document: '00000000000', name: 'John Doe' });
                    return json(buyerJson());
                },
                'POST /v2/cards': (body) => {
                    expect(body).toMatchObject({ holderName: 'John Doe', buyerUuid: 'b1' });
                    return json(cardTokenJson());
                },
                'POST /v2/orders': (body) => {
                    expect(body).toMatchObject({
                        idempotencyKey: 'order-1',
                        payment: { method: 'CREDIT_CARD', cardToken: 'tok-1', brand: 'visa' },
                    });
                    return json(orderJson({ payment: 'CREDIT_CARD', charges: [cardChargeJson()] }));
                },
                'GET /v2/charges/c2': () => json(cardChargeJson()),
                'PATCH /v2/charges/c2/refund': (body) => {
                    expect(body).toEqual({ asFraud: false });
                    return json(cardChargeJson({ status: 'REFUND' }));
                },
            });

            const barte = createClient();

            // Step 1: Register the buyer
            const buyer = await barte.buyers.create({
                document: '00000000000',
                name: 'John Doe',
                email: 'john@example.com',
                phone: '11999999999',
            });

            // Step 2: Tokenize the card
            const token = await barte.cards.createToken({
                holderName: 'John Doe',
                number: '4111111111111111',
                cvv: '123',
                expiration: '12/2030',
                buyerUuid: buyer.uuid,
            });

            // Step 3: Place the order
            const order = await barte.orders.createWithCardToken(token.uuid, {
                title: 'Order #2',
                value: 250.5,
                startDate: new Date(Date.UTC(2025, 1, 10)),
                customer,
                idempotencyKey: 'order-1',
                brand: token.brand,
            });
            expect(order.payment).toBe('CREDIT_CARD');

            // Step 4: Check the charge and refund it
            const chargeUuid = order.charges[0]?.uuid ?? '';
            const charge = await barte.charges.retrieve(chargeUuid);
            expect(charge.status).toBe('PAID');

            const refund = await charge.refund();
            expect(refund.kind).toBe('refund');
            expect(refund.status).toBe('REFUND');

            expect(fetchMock).toHaveBeenCalledTimes(5);
        });
    });

    // ── PIX flow ─────────────────────────────────────────────────────────

    describe('PIX flow', () => {
        test('should place a PIX order and read the QR code of its charge', async () => {
            setupMockApi({
                'POST /v2/orders': (body) => {
                    expect(body).toMatchObject({ payment: { method: 'PIX' }, startDate: '2025-02-12' });
                    return json(orderJson());
                },
                'GET /v2/charges/c1': () => json(pixChargeJson()),
            });

            const barte = createClient();
            const order = await barte.orders.createPix({
                title: 'Order #1',
                value: 1000,
                startDate: '2025-02-12',
                customer,
                idempotencyKey: 'order-2',
            });

            const charge = order.charges[0];
            expect(charge && isPixCharge(charge)).toBe(true);
            if (!charge || !isPixCharge(charge)) return;

            const qr = await charge.getQrCode();
            expect(qr).toEqual({
                chargeUuid: 'c1',
                qrCode: '000201test-pix-payload',
                qrCodeImage: 'https://qr.example.test/c1.png',
            });
        });
    });

    // ── Paginated listing ────────────────────────────────────────────────

    describe('paginated listing', () => {
        test('should walk pages of charges', async () => {
            const fetchMock = setupMockApi({
                'GET /v2/charges': (_body, url) => {
                    const page = Number(url.searchParams.get('page') ?? '0');
                    const charge = page === 0 ? pixChargeJson() : cardChargeJson();
                    return json(
                        pageJson([charge], {
                            pageable: { pageNumber: page, pageSize: 1 },
                            totalPages: 2,
                            totalElements: 2,
                            first: page === 0,
                            last: page === 1,
                        }),
                    );
                },
            });

            const barte = createClient();
            const first = await barte.charges.list({ page: 0, size: 1 });
            const second = await barte.charges.list({ page: 1, size: 1 });

            expect(first.pageNumber).toBe(0);
            expect(first.last).toBe(false);
            expect(first.content[0]?.uuid).toBe('c1');
            expect(second.pageNumber).toBe(1);
            expect(second.last).toBe(true);
            expect(second.content[0]?.uuid).toBe('c2');

            const [url] = fetchMock.mock.calls[1] ?? ['missing'];
            expect(String(url)).toBe('https://sandbox-api.barte.com.br/v2/charges?page=1&size=1');
        });
    });

    // ── Decoded entities and the registry ────────────────────────────────

    describe('standalone decoding', () => {
        test('should act through the most recently constructed client', async () => {
            const fetchMock = setupMockApi({
                'DELETE /v2/charges/c2': () => new Response(null, { status: 204 }),
            });

            createClient();
            const charge = decodeCharge(cardChargeJson());
            await charge.cancel();

            expect(fetchMock).toHaveBeenCalledTimes(1);
            const headers = new Headers(fetchMock.mock.calls[0]?.[1]?.headers);
            expect(headers.get('X-Token-Api')).toBe('test-key');
        });
    });

    // ── Error handling ───────────────────────────────────────────────────

    describe('error handling', () => {
        test('should surface an auth failure as RemoteApiError', async () => {
            setupMockApi({
                'GET /v2/charges/c1': () => json({ message: 'Invalid token' }, 401),
            });

            const err: unknown = await createClient()
                .charges.retrieve('c1')
                .catch((e: unknown) => e);

            expect(err).toBeInstanceOf(RemoteApiError);
            if (!(err instanceof RemoteApiError)) return;
            expect(err.code).toBe('authentication_error');
            expect(err.body).toEqual({ message: 'Invalid token' });
            expect(err.toString()).toBe(
                '[RemoteApiError: authentication_error] Barte API request failed (HTTP 401)',
            );
        });

        test('should answer 404 for an unknown charge', async () => {
            setupMockApi({});

            await expect(createClient().charges.retrieve('nope')).rejects.toMatchObject({
                statusCode: 404,
                code: 'not_found_error',
            });
        });

        test('should surface a network failure as ConnectionError', async () => {
            const fetchMock = vi.fn<typeof fetch>();
            fetchMock.mockRejectedValue(new TypeError('fetch failed'));
            vi.stubGlobal('fetch', fetchMock);

            await expect(createClient().buyers.list()).rejects.toBeInstanceOf(ConnectionError);
            expect(fetchMock).toHaveBeenCalledTimes(1);
        });

        test('should start each workflow without an active client', () => {
            expect(hasActiveClient()).toBe(false);
        });
    });
});
