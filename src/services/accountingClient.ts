import axios, { type AxiosInstance, type CreateAxiosDefaults } from 'axios';
import { ConnectivityError, PostingError, TransportError, errorMessage } from '../utils/errors.js';

export const PROBE_TIMEOUT_MS = 5_000;
export const LEDGER_TIMEOUT_MS = 15_000;
export const VOUCHER_TIMEOUT_MS = 20_000;

const CREATED_MARKER = '<CREATED>1</CREATED>';
const LINE_ERROR_PATTERN = /<LINEERROR>([\s\S]*?)<\/LINEERROR>/;

export interface RawResponse {
    status: number;
    body: string;
}

export type PostResult =
    | { ok: true; provisional: boolean; response: RawResponse }
    | { ok: false; error: PostingError | TransportError; response?: RawResponse };

export type ProbeResult =
    | { ok: true; message: string }
    | { ok: false; error: ConnectivityError };

const isSuccessStatus = (status: number) => status >= 200 && status < 300;

/**
 * Classifies a voucher-import reply. An explicit CREATED marker wins, then a
 * line error; an accepted request without markers is a provisional success.
 */
export function classifyImportResponse(response: RawResponse): PostResult {
    if (response.body.includes(CREATED_MARKER)) {
        return { ok: true, provisional: false, response };
    }

    if (response.body.includes('<LINEERROR>')) {
        const match = response.body.match(LINE_ERROR_PATTERN);
        const message = match ? match[1] : 'Accounting system reported an error';
        return { ok: false, error: new PostingError(message), response };
    }

    if (isSuccessStatus(response.status)) {
        return { ok: true, provisional: true, response };
    }

    return { ok: false, error: new PostingError(`HTTP ${response.status}`), response };
}

/** Ledger creation only needs an accepted request without a line error. */
export function classifyMasterResponse(response: RawResponse): PostResult {
    const match = response.body.match(LINE_ERROR_PATTERN);
    if (match) {
        return { ok: false, error: new PostingError(match[1]), response };
    }
    if (!isSuccessStatus(response.status)) {
        return { ok: false, error: new PostingError(`HTTP ${response.status}`), response };
    }
    return { ok: true, provisional: false, response };
}

export interface AccountingClientOptions {
    host: string;
    port: number;
    /** Company every import is addressed to; the open company when absent. */
    company?: string;
    /** Extra axios settings; tests pass an `adapter` here. */
    axiosDefaults?: CreateAxiosDefaults;
}

/**
 * Transport to the accounting system's XML endpoint. One attempt per call;
 * exceptions never escape, they come back as failed results.
 */
export class AccountingClient {
    readonly baseUrl: string;
    readonly company?: string;
    private readonly http: AxiosInstance;

    constructor(private readonly options: AccountingClientOptions) {
        this.baseUrl = `http://${options.host}:${options.port}/`;
        this.company = options.company;
        this.http = axios.create({
            ...options.axiosDefaults,
            baseURL: this.baseUrl,
            headers: { 'Content-Type': 'application/xml' },
            responseType: 'text',
            transformResponse: [(data: unknown) => data],
            validateStatus: () => true,
        });
    }

    get endpoint(): string {
        return `${this.options.host}:${this.options.port}`;
    }

    async probe(): Promise<ProbeResult> {
        try {
            const response = await this.http.get('', { timeout: PROBE_TIMEOUT_MS });
            if (response.status === 200) {
                return { ok: true, message: `Connected to accounting system on ${this.endpoint}` };
            }
            return {
                ok: false,
                error: new ConnectivityError(`Accounting system not responding (HTTP ${response.status})`),
            };
        } catch (err) {
            return {
                ok: false,
                error: new ConnectivityError(`Cannot connect to accounting system: ${errorMessage(err)}`, { cause: err }),
            };
        }
    }

    async post(xml: string, timeoutMs: number): Promise<RawResponse> {
        const response = await this.http.post('', xml, { timeout: timeoutMs });
        return { status: response.status, body: bodyText(response.data) };
    }

    async createLedger(xml: string): Promise<PostResult> {
        return this.send(xml, LEDGER_TIMEOUT_MS, classifyMasterResponse);
    }

    async importVoucher(xml: string): Promise<PostResult> {
        return this.send(xml, VOUCHER_TIMEOUT_MS, classifyImportResponse);
    }

    private async send(
        xml: string,
        timeoutMs: number,
        classify: (response: RawResponse) => PostResult
    ): Promise<PostResult> {
        let response: RawResponse;
        try {
            response = await this.post(xml, timeoutMs);
        } catch (err) {
            return { ok: false, error: new TransportError(errorMessage(err), { cause: err }) };
        }
        return classify(response);
    }
}

function bodyText(data: unknown): string {
    if (typeof data === 'string') return data;
    if (data === undefined || data === null) return '';
    return JSON.stringify(data);
}
