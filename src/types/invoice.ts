// Invoice Types
export interface LineItem {
    description?: string;
    quantity?: number;
    rate?: number;
    amount?: number;
}

/**
 * One invoice as extracted from a page, or the merged record for a whole file.
 * Every field may be missing; consumers fall back to defaults.
 */
export interface InvoiceRecord {
    invoiceNumber?: string;
    date?: string;
    vendorName?: string;
    vendorAddress?: string;
    totalAmount?: number;
    taxAmount?: number;
    lineItems?: LineItem[];
}
