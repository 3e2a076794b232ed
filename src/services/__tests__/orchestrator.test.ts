import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { runImport, runBatch, previewImport, SKIPPED_MESSAGE } from '../orchestrator.js';
import type { Extractor } from '../extract.js';
import type { InvoiceRecord } from '../../types/invoice.js';
import { loadConfig } from '../../config.js';
import { createContext } from '../../context.js';
import { silentLogger } from '../../utils/logger.js';
import { ExtractionError, PersistenceError } from '../../utils/errors.js';
import { ResultsStore, type RunStore, type RunRecord } from '../../store/resultsStore.js';
import {
    fakeAccountingClient,
    isLedgerRequest,
    isVoucherRequest,
    ACCEPTED_REPLY,
    CREATED_REPLY,
    type RecordedRequest,
    type Reply,
} from './fakeAccounting.js';

const clock = () => new Date(2025, 11, 12, 9, 30, 5);
const ctx = createContext(loadConfig({}), silentLogger, clock);

const PAGES: InvoiceRecord[] = [
    {
        invoiceNumber: 'A-100',
        vendorName: 'Acme Supplies',
        totalAmount: 100,
        lineItems: [{ description: 'Paper', amount: 40 }],
    },
    {
        totalAmount: 100,
        lineItems: [{ description: 'Ink', amount: 59.5 }],
    },
];

function stubExtractor(pages: InvoiceRecord[] | Error): Extractor {
    return {
        extractPages: async () => {
            if (pages instanceof Error) throw pages;
            return pages;
        },
    };
}

function routed(voucherReply: Reply, other: (request: RecordedRequest) => Reply = () => ACCEPTED_REPLY) {
    return (request: RecordedRequest) => (isVoucherRequest(request) ? voucherReply : other(request));
}

describe('runImport', () => {
    it('fails every step when extraction fails and contacts nothing', async () => {
        const { client, requests } = fakeAccountingClient(() => CREATED_REPLY);

        const result = await runImport('invoice.png', ctx, {
            extractor: stubExtractor(new ExtractionError('Model returned non-JSON output')),
            client,
        });

        expect(Object.values(result.steps).map(s => s.status)).toEqual(['failed', 'failed', 'failed', 'failed']);
        expect(result.steps.extraction.message).toBe('Extraction failed: Model returned non-JSON output');
        expect(result.steps.connectivity.message).toBe(SKIPPED_MESSAGE);
        expect(result.steps.ledgerCreation.message).toBe(SKIPPED_MESSAGE);
        expect(result.steps.voucherCreation.message).toBe(SKIPPED_MESSAGE);
        expect(result.success).toBe(false);
        expect(result.overallStatus).toBe('failed');
        expect(result.error).toBe('Model returned non-JSON output');
        expect(requests).toHaveLength(0);
    });

    it('probes, creates ledgers, then imports the voucher', async () => {
        const { client, requests } = fakeAccountingClient(routed(CREATED_REPLY));

        const result = await runImport('invoice.json', ctx, { extractor: stubExtractor(PAGES), client });

        expect(result.success).toBe(true);
        expect(result.overallStatus).toBe('success');
        expect(result.pagesProcessed).toBe(2);
        expect(result.runKey).toBe('20251212_093005');
        expect(Object.values(result.steps).map(s => s.status)).toEqual(['success', 'success', 'success', 'success']);
        expect(result.steps.extraction.message).toBe('Extracted data from 2 page(s)');
        expect(result.steps.voucherCreation.message).toBe('Voucher created successfully');

        expect(requests.map(r => r.method)).toEqual(['GET', 'POST', 'POST', 'POST', 'POST', 'POST']);
        expect(requests.slice(1, 5).every(isLedgerRequest)).toBe(true);
        expect(isVoucherRequest(requests[5])).toBe(true);
        expect(requests[5].body).toContain('<DATE>12122025</DATE>');
        expect(requests[5].body).toContain('<AMOUNT>60.00</AMOUNT>');
        expect(result.trail.map(t => t.step)).toEqual(['extraction', 'connectivity', 'ledgerCreation', 'voucherCreation']);
    });

    it('continues when the connectivity probe fails', async () => {
        const { client } = fakeAccountingClient(request =>
            request.method === 'GET' ? new Error('connect ECONNREFUSED') : routed(CREATED_REPLY)(request)
        );

        const result = await runImport('invoice.json', ctx, { extractor: stubExtractor(PAGES), client });

        expect(result.steps.connectivity.status).toBe('failed');
        expect(result.steps.connectivity.message).toBe('Cannot connect to accounting system: connect ECONNREFUSED');
        expect(result.steps.voucherCreation.status).toBe('success');
        expect(result.success).toBe(true);
    });

    it('marks ledger creation successful even when a ledger is rejected', async () => {
        const { client } = fakeAccountingClient(routed(CREATED_REPLY, request =>
            request.body.includes('<NAME>Ink</NAME>') ? { status: 200, body: '<LINEERROR>Bad name</LINEERROR>' } : ACCEPTED_REPLY
        ));

        const result = await runImport('invoice.json', ctx, { extractor: stubExtractor(PAGES), client });

        expect(result.steps.ledgerCreation.status).toBe('success');
        expect(result.steps.ledgerCreation.message).toBe('Attempted 4 ledger(s): 3 created, 1 failed');
        expect(result.steps.ledgerCreation.data).toEqual({
            vendorLedger: 'Acme Supplies',
            itemLedgers: ['Paper', 'Ink'],
            outcomes: [
                { name: 'Acme Supplies', ok: true, message: 'created' },
                { name: 'Purchase Account', ok: true, message: 'created' },
                { name: 'Paper', ok: true, message: 'created' },
                { name: 'Ink', ok: false, message: 'Bad name' },
            ],
        });
    });

    it('surfaces the accounting system error verbatim', async () => {
        const { client } = fakeAccountingClient(routed({ status: 200, body: '<LINEERROR>Bad date</LINEERROR>' }));

        const result = await runImport('invoice.json', ctx, { extractor: stubExtractor(PAGES), client });

        expect(result.success).toBe(false);
        expect(result.overallStatus).toBe('partial_success');
        expect(result.error).toBe('Bad date');
        expect(result.steps.voucherCreation).toMatchObject({ status: 'failed', message: 'Voucher creation failed: Bad date' });
    });

    it('reports a timeout on the voucher import', async () => {
        const { client } = fakeAccountingClient(routed(new Error('timeout of 20000ms exceeded')));

        const result = await runImport('invoice.json', ctx, { extractor: stubExtractor(PAGES), client });

        expect(result.steps.voucherCreation.status).toBe('failed');
        expect(result.error).toBe('timeout of 20000ms exceeded');
    });

    it('accepts an import reply without a CREATED marker provisionally', async () => {
        const { client } = fakeAccountingClient(() => ACCEPTED_REPLY);

        const result = await runImport('invoice.json', ctx, { extractor: stubExtractor(PAGES), client });

        expect(result.success).toBe(true);
        expect(result.steps.voucherCreation.message).toBe('Import accepted without confirmation marker');
    });

    it('never leaves a step pending', async () => {
        const replies: Reply[] = [new Error('down'), ACCEPTED_REPLY, CREATED_REPLY];
        for (const reply of replies) {
            const { client } = fakeAccountingClient(() => reply);
            const result = await runImport('invoice.json', ctx, { extractor: stubExtractor(PAGES), client });
            for (const step of Object.values(result.steps)) {
                expect(['success', 'failed']).toContain(step.status);
            }
        }
    });

    describe('with a results store', () => {
        let dir: string;
        let store: ResultsStore;

        beforeEach(async () => {
            dir = fs.mkdtempSync(path.join(os.tmpdir(), 'orchestrator-'));
            store = await ResultsStore.open(dir);
        });

        afterEach(() => {
            store.close();
            fs.rmSync(dir, { recursive: true, force: true });
        });

        it('saves the merged record and voucher under the run key', async () => {
            const { client } = fakeAccountingClient(routed(CREATED_REPLY));

            const result = await runImport('invoice.json', ctx, { extractor: stubExtractor(PAGES), client, store });

            expect(result.jsonFile).toBe(path.join(dir, 'invoice_20251212_093005.json'));
            expect(result.xmlFile).toBe(path.join(dir, 'voucher_20251212_093005.xml'));
            const saved = JSON.parse(fs.readFileSync(path.join(dir, 'invoice_20251212_093005.json'), 'utf-8'));
            expect(saved.lineItems).toHaveLength(2);
            expect(fs.readFileSync(path.join(dir, 'voucher_20251212_093005.xml'), 'utf-8')).toBe(result.voucherXml);
            expect(store.listHistory().map(h => h.invoiceNumber)).toEqual(['A-100']);
        });
    });
});

describe('runImport with a failing store', () => {
    function failingStore(saved: RunRecord[]): RunStore {
        return {
            save: async run => {
                saved.push(run);
                throw new PersistenceError('Cannot write results: disk full');
            },
            listHistory: () => [],
            close: () => undefined,
        };
    }

    it('reports the save failure without changing the voucher outcome', async () => {
        const { client } = fakeAccountingClient(routed(CREATED_REPLY));
        const saved: RunRecord[] = [];

        const result = await runImport('invoice.json', ctx, {
            extractor: stubExtractor(PAGES),
            client,
            store: failingStore(saved),
        });

        expect(result.persistenceError).toBe('Cannot write results: disk full');
        expect(result.success).toBe(true);
        expect(result.overallStatus).toBe('success');
        expect(result.error).toBeUndefined();
        expect(result.steps.voucherCreation).toMatchObject({ status: 'success', message: 'Voucher created successfully' });
        expect(Object.values(result.steps).map(s => s.status)).toEqual(['success', 'success', 'success', 'success']);
        expect(result.jsonFile).toBeUndefined();
        expect(result.xmlFile).toBeUndefined();
        expect(saved).toHaveLength(1);
        expect(saved[0].voucherXml).toBe(result.voucherXml);
    });

    it('keeps a failed voucher failed when the save also fails', async () => {
        const { client } = fakeAccountingClient(routed({ status: 200, body: '<LINEERROR>Bad date</LINEERROR>' }));

        const result = await runImport('invoice.json', ctx, {
            extractor: stubExtractor(PAGES),
            client,
            store: failingStore([]),
        });

        expect(result.persistenceError).toBe('Cannot write results: disk full');
        expect(result.error).toBe('Bad date');
        expect(result.overallStatus).toBe('partial_success');
        for (const step of Object.values(result.steps)) {
            expect(['success', 'failed']).toContain(step.status);
        }
    });
});

describe('runBatch', () => {
    it('processes every file in order and keeps going after failures', async () => {
        const { client } = fakeAccountingClient(routed(CREATED_REPLY));
        const extractor: Extractor = {
            extractPages: async filePath => {
                if (filePath === 'first.json') throw new ExtractionError('unreadable');
                return PAGES;
            },
        };

        const batch = await runBatch(['first.json', 'notes.txt', 'third.json'], ctx, { extractor, client });

        expect(batch.totalFiles).toBe(3);
        expect(batch.successfulFiles).toBe(1);
        expect(batch.failedFiles).toBe(2);
        expect(batch.results.map(r => r.sourceFile)).toEqual(['first.json', 'notes.txt', 'third.json']);
        expect(batch.results[1].error).toBe('Invalid file type: notes.txt');
        expect(batch.results[1].steps.voucherCreation.status).toBe('failed');
        expect(batch.results[2].success).toBe(true);
    });
});

describe('previewImport', () => {
    it('builds the voucher without contacting the accounting system', async () => {
        const preview = await previewImport('invoice.json', ctx, stubExtractor(PAGES));

        expect(preview.pagesProcessed).toBe(2);
        expect(preview.voucher.itemized).toBe(true);
        expect(preview.voucher.entries.map(e => e.amount)).toEqual([-100, 40, 60]);
        expect(preview.xml).toContain('<VOUCHERNUMBER>A-100</VOUCHERNUMBER>');
    });
});
