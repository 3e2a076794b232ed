// Chart-of-accounts Types
export type LedgerGroup = 'Sundry Creditors' | 'Purchase Accounts';

export interface LedgerSpec {
    name: string;
    parent: LedgerGroup;
    billWise: boolean;  // only for the vendor's payable ledger
}

export interface LedgerOutcome {
    ledger: LedgerSpec;
    ok: boolean;
    message: string;
}
