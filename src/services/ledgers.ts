import type { InvoiceRecord } from '../types/invoice.js';
import type { LedgerOutcome, LedgerSpec } from '../types/ledger.js';
import type { AccountingClient } from './accountingClient.js';
import { ledgerEnvelope } from '../xml/envelopes.js';
import { serializeXml } from '../xml/document.js';
import { itemLedgerName, partyLedgerName, PURCHASE_LEDGER } from './voucher.js';
import { silentLogger, type Logger } from '../utils/logger.js';

/**
 * Ledgers the voucher will reference: the vendor (payable, bill-wise), the
 * generic purchase ledger, then one purchase ledger per distinct item description.
 * An item named like the vendor reuses the vendor ledger.
 */
export function requiredLedgers(invoice: InvoiceRecord): LedgerSpec[] {
    const party = partyLedgerName(invoice);
    const ledgers: LedgerSpec[] = [
        { name: party, parent: 'Sundry Creditors', billWise: true },
        { name: PURCHASE_LEDGER, parent: 'Purchase Accounts', billWise: false },
    ];

    const seen = new Set<string>([party, PURCHASE_LEDGER]);
    for (const item of invoice.lineItems ?? []) {
        const name = itemLedgerName(item.description);
        if (seen.has(name)) continue;
        seen.add(name);
        ledgers.push({ name, parent: 'Purchase Accounts', billWise: false });
    }

    return ledgers;
}

export async function createLedger(
    client: AccountingClient,
    ledger: LedgerSpec,
    logger: Logger = silentLogger
): Promise<LedgerOutcome> {
    const result = await client.createLedger(serializeXml(ledgerEnvelope(ledger, client.company)));

    if (result.ok) {
        logger.info(`Ledger created: ${ledger.name} (${ledger.parent})`);
        return { ledger, ok: true, message: 'created' };
    }

    logger.warn(`Ledger creation issue for ${ledger.name}: ${result.error.message}`);
    return { ledger, ok: false, message: result.error.message };
}

export interface LedgerCreationOptions {
    concurrency?: number;
    logger?: Logger;
}

/**
 * Attempts every required ledger. Individual failures are recorded, never
 * thrown; the returned promise settles only after every attempt has finished.
 */
export async function createRequiredLedgers(
    client: AccountingClient,
    ledgers: LedgerSpec[],
    options: LedgerCreationOptions = {}
): Promise<LedgerOutcome[]> {
    const concurrency = Math.max(1, options.concurrency ?? 1);
    const outcomes: LedgerOutcome[] = new Array(ledgers.length);
    let next = 0;

    const worker = async () => {
        while (next < ledgers.length) {
            const index = next++;
            outcomes[index] = await createLedger(client, ledgers[index], options.logger);
        }
    };

    const workers = Array.from({ length: Math.min(concurrency, ledgers.length) }, () => worker());
    await Promise.all(workers);

    return outcomes;
}
