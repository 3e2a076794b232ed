import type { LedgerSpec } from '../types/ledger.js';
import type { LedgerEntryLine, VoucherDocument } from '../types/voucher.js';
import { element, textElement, type XmlElement } from './document.js';

const UDF_NAMESPACE = { 'xmlns:UDF': 'TallyUDF' };

function yesNo(flag: boolean): string {
    return flag ? 'Yes' : 'No';
}

export function formatAmount(amount: number): string {
    return amount.toFixed(2);
}

/**
 * Import Data envelope addressed to `reportName`, wrapping one message body.
 * With a company name the request targets that company instead of the one
 * currently open.
 */
function importEnvelope(reportName: string, message: XmlElement, company?: string): XmlElement {
    const description: XmlElement[] = [textElement('REPORTNAME', reportName)];
    if (company) {
        description.push(element('STATICVARIABLES', {}, textElement('SVCURRENTCOMPANY', company)));
    }

    return element('ENVELOPE', {},
        element('HEADER', {}, textElement('TALLYREQUEST', 'Import Data')),
        element('BODY', {},
            element('IMPORTDATA', {},
                element('REQUESTDESC', {}, ...description),
                element('REQUESTDATA', {},
                    element('TALLYMESSAGE', UDF_NAMESPACE, message),
                ),
            ),
        ),
    );
}

export function ledgerEnvelope(ledger: LedgerSpec, company?: string): XmlElement {
    return importEnvelope('All Masters',
        element('LEDGER', { NAME: ledger.name, ACTION: 'Create' },
            textElement('NAME', ledger.name),
            textElement('PARENT', ledger.parent),
            textElement('ISBILLWISEON', yesNo(ledger.billWise)),
        ),
        company,
    );
}

function entryElement(entry: LedgerEntryLine): XmlElement {
    return element('ALLLEDGERENTRIES.LIST', {},
        textElement('LEDGERNAME', entry.ledgerName),
        textElement('ISDEEMEDPOSITIVE', yesNo(entry.deemedPositive)),
        textElement('AMOUNT', formatAmount(entry.amount)),
    );
}

export function voucherEnvelope(voucher: VoucherDocument, company?: string): XmlElement {
    return importEnvelope('Vouchers',
        element('VOUCHER', { REMOTEID: '', VCHKEY: '', VCHTYPE: voucher.voucherType, ACTION: 'Create' },
            textElement('DATE', voucher.date),
            textElement('VOUCHERTYPENAME', voucher.voucherType),
            textElement('VOUCHERNUMBER', voucher.voucherNumber),
            textElement('PARTYLEDGERNAME', voucher.partyLedgerName),
            ...voucher.entries.map(entryElement),
        ),
        company,
    );
}
