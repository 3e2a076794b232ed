import { z } from 'zod';
import type { InvoiceRecord } from '../types/invoice.js';

// treat null/"" as absent for optional strings
const optStr = z
    .union([z.string(), z.number(), z.null(), z.undefined()])
    .transform(v => (v == null || v === '' ? undefined : String(v)));

// numbers may arrive as strings ("1,250.00"); unparseable values become absent
const optNum = z
    .union([z.number(), z.string(), z.null(), z.undefined()])
    .transform(v => {
        if (v == null || v === '') return undefined;
        const n = typeof v === 'number' ? v : Number(v.replace(/[,\s]/g, ''));
        return Number.isFinite(n) ? n : undefined;
    });

export const lineItemSchema = z.object({
    description: optStr,
    quantity: optNum,
    rate: optNum,
    amount: optNum,
});

export const pageExtractionSchema = z.object({
    invoice_number: optStr,
    date: optStr,
    vendor_name: optStr,
    vendor_address: optStr,
    total_amount: optNum,
    tax_amount: optNum,
    line_items: z.union([z.array(lineItemSchema), z.null(), z.undefined()]),
});

export type PageExtraction = z.infer<typeof pageExtractionSchema>;

export function toInvoiceRecord(page: PageExtraction): InvoiceRecord {
    return {
        invoiceNumber: page.invoice_number,
        date: page.date,
        vendorName: page.vendor_name,
        vendorAddress: page.vendor_address,
        totalAmount: page.total_amount,
        taxAmount: page.tax_amount,
        lineItems: page.line_items ?? undefined,
    };
}
