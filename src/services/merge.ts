import type { InvoiceRecord, LineItem } from '../types/invoice.js';

/**
 * Merge Service - Consolidates one-record-per-page extractions into one invoice.
 *
 * Header fields come from the first page. Line items are concatenated in page
 * order. Totals take the largest value seen on any page.
 */
export function mergeExtractions(records: InvoiceRecord[]): InvoiceRecord {
    if (records.length === 0) return {};
    if (records.length === 1) return records[0];

    const lineItems: LineItem[] = [];
    let totalAmount = 0;
    let taxAmount = 0;

    for (const record of records) {
        if (record.lineItems) {
            lineItems.push(...record.lineItems);
        }
        if (record.totalAmount !== undefined) {
            totalAmount = Math.max(totalAmount, record.totalAmount);
        }
        if (record.taxAmount !== undefined) {
            taxAmount = Math.max(taxAmount, record.taxAmount);
        }
    }

    return {
        ...records[0],
        lineItems,
        totalAmount,
        taxAmount,
    };
}
