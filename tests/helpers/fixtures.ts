// ---------------------------------------------------------------------------
// Barte SDK – Shared test fixtures
// ---------------------------------------------------------------------------
// Made-up API payloads plus an in-process Transport that records calls and
// replays queued answers.
// ---------------------------------------------------------------------------

import type {
    HttpMethod,
    JsonValue,
    QueryParams,
    Transport,
    TransportResult,
} from '../../src/http';

export type JsonObject = { [key: string]: JsonValue };

export function customerJson(overrides: JsonObject = {}): JsonObject {
    return {
        uuid: 'cus-1',
        document: '00000000000',
        type: 'CPF',
        name: 'John Doe',
        email: 'john@example.com',
        phone: '11999999999',
        alternativeEmail: '',
        ...overrides,
    };
}

/** A scheduled PIX charge. */
export function pixChargeJson(overrides: JsonObject = {}): JsonObject {
    return {
        uuid: 'c1',
        title: 'Order #1',
        value: 1000.0,
        paymentMethod: 'PIX',
        status: 'SCHEDULED',
        customer: customerJson(),
        expirationDate: '2025-02-12',
        pixCode: '000201test-pix-payload',
        pixQRCodeImage: 'https://qr.example.test/c1.png',
        ...overrides,
    };
}

/** A paid credit-card charge. */
export function cardChargeJson(overrides: JsonObject = {}): JsonObject {
    return {
        uuid: 'c2',
        title: 'Order #2',
        value: 250.5,
        paymentMethod: 'CREDIT_CARD',
        status: 'PAID',
        customer: customerJson(),
        expirationDate: '2025-02-12',
        paidDate: '2025-02-10T13:45:00Z',
        authorizationCode: 'AUTH-1',
        authorizationNsu: 'NSU-1',
        installments: 3,
        installmentAmount: 83.5,
        ...overrides,
    };
}

export function orderCustomerJson(overrides: JsonObject = {}): JsonObject {
    return {
        document: '00000000000',
        type: 'CPF',
        documentCountry: 'BR',
        name: 'John Doe',
        email: 'john@example.com',
        phone: '11999999999',
        alternativeEmail: '',
        ...overrides,
    };
}

export function orderJson(overrides: JsonObject = {}): JsonObject {
    return {
        uuid: 'o1',
        status: 'SCHEDULED',
        title: 'Order #1',
        description: 'Two charges',
        value: 1000.0,
        installments: 1,
        startDate: '2025-02-12',
        payment: 'PIX',
        customer: orderCustomerJson(),
        idempotencyKey: 'idem-1',
        charges: [pixChargeJson()],
        ...overrides,
    };
}

export function buyerJson(overrides: JsonObject = {}): JsonObject {
    return {
        uuid: 'b1',
        document: '00000000000',
        name: 'John Doe',
        email: 'john@example.com',
        phone: '11999999999',
        countryCode: '+55',
        alternativeEmail: '',
        ...overrides,
    };
}

export function cardTokenJson(overrides: JsonObject = {}): JsonObject {
    return {
        uuid: 'tok-1',
        status: 'ACTIVE',
        createdAt: '2025-01-07T10:00:00Z',
        brand: 'visa',
        cardHolderName: 'John Doe',
        cvvChecked: true,
        fingerprint: 'fp-1',
        first6digits: '411111',
        last4digits: '1111',
        buyerId: 'b1',
        expirationMonth: '12',
        expirationYear: '2030',
        cardId: 'card-1',
        ...overrides,
    };
}

/** A Spring-style page around `content`. */
export function pageJson(content: JsonValue[], overrides: JsonObject = {}): JsonObject {
    return {
        content,
        pageable: {
            sort: { sorted: false, unsorted: true, empty: true },
            pageNumber: 0,
            pageSize: 20,
            offset: 0,
            paged: true,
            unpaged: false,
        },
        totalPages: 1,
        totalElements: content.length,
        last: true,
        numberOfElements: content.length,
        size: 20,
        number: 0,
        sort: { sorted: false, unsorted: true, empty: true },
        first: true,
        empty: content.length === 0,
        ...overrides,
    };
}

export interface RecordedCall {
    method: HttpMethod;
    path: string;
    query?: QueryParams;
    body?: unknown;
}

/** In-process Transport: records each call and answers from a queue. */
export class FakeTransport implements Transport {
    readonly calls: RecordedCall[] = [];
    private readonly replies: (TransportResult | Error)[] = [];

    /** Queue answers, consumed in order. An Error is thrown instead of returned. */
    reply(...results: (TransportResult | Error)[]): this {
        this.replies.push(...results);
        return this;
    }

    async send(
        method: HttpMethod,
        path: string,
        query?: QueryParams,
        body?: unknown,
    ): Promise<TransportResult> {
        this.calls.push({ method, path, query, body });
        const next = this.replies.shift();
        if (next === undefined) {
            throw new Error(`No reply queued for ${method} ${path}`);
        }
        if (next instanceof Error) {
            throw next;
        }
        return next;
    }

    lastCall(): RecordedCall {
        const call = this.calls.at(-1);
        if (!call) {
            throw new Error('Transport was not called');
        }
        return call;
    }
}
