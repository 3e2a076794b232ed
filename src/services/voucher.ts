import type { InvoiceRecord } from '../types/invoice.js';
import type { LedgerEntryLine, VoucherDocument } from '../types/voucher.js';
import { sanitize } from '../utils/sanitize.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export const PURCHASE_LEDGER = 'Purchase Account';
export const DEFAULT_VENDOR = 'Unknown Vendor';
export const DEFAULT_VOUCHER_NUMBER = 'INV001';

// Defaults, overridable through SynthesisOptions
const MINIMUM_POSTING_AMOUNT = 1.0;
const RECONCILIATION_TOLERANCE = 1.0;

/** Maps the invoice's own date text and the processing time to a DDMMYYYY posting date. */
export type PostingDatePolicy = (invoiceDate: string | undefined, now: Date) => string;

export function formatPostingDate(date: Date): string {
    const day = String(date.getDate()).padStart(2, '0');
    const month = String(date.getMonth() + 1).padStart(2, '0');
    return `${day}${month}${date.getFullYear()}`;
}

/** Posts on the processing date; the invoice's own date is ignored. */
export const currentDatePolicy: PostingDatePolicy = (_invoiceDate, now) => formatPostingDate(now);

export interface SynthesisOptions {
    clock?: () => Date;
    postingDate?: PostingDatePolicy;
    minimumAmount?: number;
    tolerance?: number;
    logger?: Logger;
}

export function partyLedgerName(invoice: InvoiceRecord): string {
    return sanitize(invoice.vendorName ?? DEFAULT_VENDOR);
}

/** Items without a usable description post to the generic purchase ledger. */
export function itemLedgerName(description: string | undefined): string {
    return description?.trim() ? sanitize(description) : PURCHASE_LEDGER;
}

const toCents = (amount: number) => Math.round(amount * 100);
const fromCents = (cents: number) => cents / 100;

function finiteOrZero(value: number | undefined): number {
    return value !== undefined && Number.isFinite(value) ? value : 0;
}

/**
 * Voucher Service - Builds a balanced Purchase voucher from a merged invoice.
 *
 * Items are posted individually when they add up to the invoice total within
 * the tolerance; otherwise the whole total goes to the generic purchase
 * ledger. The party entry always carries the negated total.
 */
export function synthesizeVoucher(invoice: InvoiceRecord, options: SynthesisOptions = {}): VoucherDocument {
    const logger = options.logger ?? silentLogger;
    const now = (options.clock ?? (() => new Date()))();
    const postingDate = options.postingDate ?? currentDatePolicy;
    const minimumAmount = options.minimumAmount ?? MINIMUM_POSTING_AMOUNT;
    const tolerance = options.tolerance ?? RECONCILIATION_TOLERANCE;

    const party = partyLedgerName(invoice);
    const voucherNumber = sanitize(invoice.invoiceNumber ?? DEFAULT_VOUCHER_NUMBER);

    let total = finiteOrZero(invoice.totalAmount);
    let amountNormalized = false;
    if (total <= 0) {
        logger.warn(`Invoice ${voucherNumber} has non-positive total ${total}; posting placeholder amount ${minimumAmount}`);
        total = minimumAmount;
        amountNormalized = true;
    }

    const totalCents = toCents(total);
    const lineItems = invoice.lineItems ?? [];
    const itemCents = lineItems.map(item => toCents(finiteOrZero(item.amount)));
    const lineItemsCents = itemCents.reduce((sum, cents) => sum + cents, 0);
    const itemized = lineItems.length > 0 && Math.abs(lineItemsCents - totalCents) < toCents(tolerance);

    const entries: LedgerEntryLine[] = [
        { ledgerName: party, deemedPositive: false, amount: -fromCents(totalCents) },
    ];

    if (itemized) {
        // Fold the sub-tolerance residual into the last item so the voucher balances
        const residual = totalCents - lineItemsCents;
        lineItems.forEach((item, i) => {
            const cents = i === lineItems.length - 1 ? itemCents[i] + residual : itemCents[i];
            entries.push({
                ledgerName: itemLedgerName(item.description),
                deemedPositive: true,
                amount: fromCents(cents),
            });
        });
        if (residual !== 0) {
            logger.debug(`Adjusted last item by ${fromCents(residual)} to balance voucher ${voucherNumber}`);
        }
    } else {
        entries.push({ ledgerName: PURCHASE_LEDGER, deemedPositive: true, amount: fromCents(totalCents) });
    }

    return {
        date: postingDate(invoice.date, now),
        voucherType: 'Purchase',
        voucherNumber,
        partyLedgerName: party,
        entries,
        itemized,
        amountNormalized,
    };
}

/** Sum of signed entry amounts, in cents. Zero for a balanced voucher. */
export function voucherBalanceCents(voucher: VoucherDocument): number {
    return voucher.entries.reduce((sum, entry) => sum + toCents(entry.amount), 0);
}
