// Voucher Types
export interface LedgerEntryLine {
    ledgerName: string;
    deemedPositive: boolean;
    amount: number;  // signed, negative for the party entry
}

export interface VoucherDocument {
    date: string;  // DDMMYYYY
    voucherType: 'Purchase';
    voucherNumber: string;
    partyLedgerName: string;
    entries: LedgerEntryLine[];
    itemized: boolean;
    amountNormalized: boolean;
}
