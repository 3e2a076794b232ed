import * as path from 'path';
import chalk from 'chalk';
import { loadConfig } from '../src/config.js';
import { createContext } from '../src/context.js';
import { FileExtractor } from '../src/services/extract.js';
import { requiredLedgers } from '../src/services/ledgers.js';
import { previewImport } from '../src/services/orchestrator.js';
import { createLogger } from '../src/utils/logger.js';

// ==========================================
// DEMO RUNNER - Invoice to Voucher (dry run)
// ==========================================

const DIVIDER = '='.repeat(80);

function printHeader(text: string) {
    console.log('\n' + chalk.cyan(DIVIDER));
    console.log(chalk.cyan.bold(`  ${text.toUpperCase()}`));
    console.log(chalk.cyan(DIVIDER));
}

async function runDemo() {
    const config = loadConfig(process.env);
    const ctx = createContext(config, createLogger('debug'));
    const file = path.join(process.cwd(), 'data', 'sample_invoice.json');

    printHeader('Step 1: Merge page extractions');
    const preview = await previewImport(file, ctx, new FileExtractor(config));
    console.log(chalk.gray(`Pages: ${preview.pagesProcessed}`));
    console.log(chalk.gray(JSON.stringify(preview.invoice, null, 2)));

    printHeader('Step 2: Ledgers to create');
    requiredLedgers(preview.invoice).forEach(ledger => {
        const billWise = ledger.billWise ? chalk.yellow(' [bill-wise]') : '';
        console.log(`  ${chalk.white(ledger.name)} ${chalk.gray('->')} ${ledger.parent}${billWise}`);
    });

    printHeader('Step 3: Voucher');
    const { voucher } = preview;
    console.log(chalk.white(`  ${voucher.voucherType} ${voucher.voucherNumber} dated ${voucher.date}`));
    console.log(chalk.gray(`  ${voucher.itemized ? 'Itemized posting' : 'Lump-sum posting'}${voucher.amountNormalized ? ' (placeholder amount)' : ''}`));
    voucher.entries.forEach(entry => {
        const amount = entry.amount < 0 ? chalk.red(entry.amount.toFixed(2)) : chalk.green(entry.amount.toFixed(2));
        console.log(`    ${entry.ledgerName.padEnd(40)} ${amount}`);
    });

    printHeader('Step 4: Wire document');
    console.log(chalk.gray(preview.xml));
}

runDemo().catch(err => {
    console.error(chalk.red('Demo failed:'), err);
    process.exit(1);
});
