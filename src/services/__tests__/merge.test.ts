import { describe, it, expect } from 'vitest';
import { mergeExtractions } from '../merge.js';
import type { InvoiceRecord, LineItem } from '../../types/invoice.js';

const A: LineItem = { description: 'Paper', quantity: 2, rate: 10, amount: 20 };
const B: LineItem = { description: 'Toner', quantity: 1, rate: 55, amount: 55 };
const C: LineItem = { description: 'Binder', quantity: 5, rate: 5, amount: 25 };

describe('mergeExtractions', () => {
    it('returns an empty record for no pages', () => {
        expect(mergeExtractions([])).toEqual({});
    });

    it('returns a single page unchanged', () => {
        const page: InvoiceRecord = { invoiceNumber: 'INV-7', totalAmount: 12.5, lineItems: [A] };
        expect(mergeExtractions([page])).toBe(page);
    });

    it('concatenates line items in page order and keeps the largest total', () => {
        const merged = mergeExtractions([
            { lineItems: [A, B], totalAmount: 100 },
            { lineItems: [C], totalAmount: 80 },
        ]);
        expect(merged.lineItems).toEqual([A, B, C]);
        expect(merged.totalAmount).toBe(100);
    });

    it('takes header fields from the first page', () => {
        const merged = mergeExtractions([
            { invoiceNumber: 'INV-1', vendorName: 'Acme', vendorAddress: '1 Road', date: '01-02-2025' },
            { invoiceNumber: 'INV-1 (cont.)', vendorName: 'ACME LTD', date: '02-02-2025' },
        ]);
        expect(merged.invoiceNumber).toBe('INV-1');
        expect(merged.vendorName).toBe('Acme');
        expect(merged.vendorAddress).toBe('1 Road');
        expect(merged.date).toBe('01-02-2025');
    });

    it('takes the maximum tax and skips pages without totals', () => {
        const merged = mergeExtractions([
            { taxAmount: 4 },
            { totalAmount: 60, taxAmount: 9 },
            {},
        ]);
        expect(merged.totalAmount).toBe(60);
        expect(merged.taxAmount).toBe(9);
        expect(merged.lineItems).toEqual([]);
    });

    it('does not modify the input pages', () => {
        const first: InvoiceRecord = { lineItems: [A], totalAmount: 20 };
        mergeExtractions([first, { lineItems: [B], totalAmount: 75 }]);
        expect(first).toEqual({ lineItems: [A], totalAmount: 20 });
    });
});
