import * as fs from 'fs';
import * as path from 'path';
import { parseArgs } from 'util';
import chalk from 'chalk';
import { InvoiceProcessor } from './index.js';
import { loadConfig, loadEnvFile } from './config.js';
import { createContext } from './context.js';
import { FileExtractor } from './services/extract.js';
import { previewImport } from './services/orchestrator.js';
import type { ImportResult } from './types/output.js';
import { errorMessage } from './utils/errors.js';

const USAGE = `Usage: invoice-post <invoice-file...> [--output <dir>] [--token <token>] [--dry-run] [--history]`;

function printResult(result: ImportResult) {
    console.log(chalk.white.bold(`\n${result.sourceFile}`));
    for (const [name, step] of Object.entries(result.steps)) {
        const badge = step.status === 'success' ? chalk.green('[OK]  ') : chalk.red('[FAIL]');
        console.log(`  ${badge} ${name}: ${chalk.gray(step.message)}`);
    }
    if (result.invoice) {
        console.log(chalk.gray(`  Invoice: ${result.invoice.invoiceNumber ?? 'N/A'}  Vendor: ${result.invoice.vendorName ?? 'N/A'}  Amount: ${result.invoice.totalAmount ?? 0}`));
    }
    if (result.xmlFile) console.log(chalk.gray(`  XML: ${result.xmlFile}`));
    if (result.error) console.log(chalk.red(`  Error: ${result.error}`));
    if (result.persistenceError) console.log(chalk.yellow(`  Not saved: ${result.persistenceError}`));
}

async function main(argv: string[]): Promise<number> {
    const { values, positionals } = parseArgs({
        args: argv,
        allowPositionals: true,
        options: {
            output: { type: 'string', short: 'o' },
            token: { type: 'string' },
            'dry-run': { type: 'boolean', default: false },
            history: { type: 'boolean', default: false },
        },
    });

    loadEnvFile();

    if (values['dry-run']) {
        const config = loadConfig(process.env, { token: values.token, resultsDir: values.output });
        const ctx = createContext(config);
        const extractor = new FileExtractor(config);
        let failed = 0;
        for (const file of positionals) {
            try {
                const preview = await previewImport(file, ctx, extractor);
                const target = path.join(config.resultsDir, `${path.parse(file).name}_voucher.xml`);
                fs.mkdirSync(config.resultsDir, { recursive: true });
                fs.writeFileSync(target, preview.xml, 'utf-8');
                console.log(chalk.green(`Voucher XML generated: ${target}`));
            } catch (err) {
                failed++;
                console.log(chalk.red(`Error: ${file}: ${errorMessage(err)}`));
            }
        }
        return failed === 0 && positionals.length > 0 ? 0 : 1;
    }

    const processor = await InvoiceProcessor.create({ token: values.token, resultsDir: values.output });
    try {
        if (values.history) {
            for (const entry of processor.history()) {
                console.log(`${entry.createdAt}  ${entry.status.padEnd(15)} ${entry.invoiceNumber ?? 'N/A'}  ${entry.vendorName ?? 'N/A'}  ${entry.totalAmount ?? 0}`);
            }
            return 0;
        }

        if (positionals.length === 0) {
            console.log(USAGE);
            return 1;
        }

        const batch = await processor.processFiles(positionals);
        batch.results.forEach(printResult);
        console.log(chalk.white.bold(`\n${batch.successfulFiles}/${batch.totalFiles} file(s) imported`));
        return batch.failedFiles === 0 ? 0 : 1;
    } finally {
        processor.shutdown();
    }
}

main(process.argv.slice(2)).then(
    code => process.exit(code),
    err => {
        console.log(chalk.red(`Error: ${errorMessage(err)}`));
        process.exit(1);
    }
);
