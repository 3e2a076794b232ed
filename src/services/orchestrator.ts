import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { InvoiceRecord } from '../types/invoice.js';
import type { VoucherDocument } from '../types/voucher.js';
import type { BatchResult, ImportResult, ImportSteps, StepEntry, StepName } from '../types/output.js';
import type { PipelineContext } from '../context.js';
import type { AccountingClient } from './accountingClient.js';
import type { Extractor } from './extract.js';
import { isSupportedFile } from './extract.js';
import { mergeExtractions } from './merge.js';
import { createRequiredLedgers, requiredLedgers } from './ledgers.js';
import { synthesizeVoucher, type SynthesisOptions } from './voucher.js';
import { voucherEnvelope } from '../xml/envelopes.js';
import { serializeXml } from '../xml/document.js';
import { formatRunKey, type RunStore } from '../store/resultsStore.js';
import { createStepEntry } from '../utils/auditTrail.js';
import { errorMessage } from '../utils/errors.js';

export const SKIPPED_MESSAGE = 'skipped due to previous error';

export interface ImportDependencies {
    extractor: Extractor;
    client: AccountingClient;
    store?: RunStore;
}

export function initialSteps(): ImportSteps {
    return {
        extraction: { status: 'pending', message: '' },
        connectivity: { status: 'pending', message: '' },
        ledgerCreation: { status: 'pending', message: '' },
        voucherCreation: { status: 'pending', message: '' },
    };
}

function synthesisOptions(ctx: PipelineContext): SynthesisOptions {
    return {
        clock: ctx.clock,
        minimumAmount: ctx.config.posting.minimumAmount,
        tolerance: ctx.config.posting.reconciliationTolerance,
        logger: ctx.logger,
    };
}

/** Rewrites every step that never finished to `failed`. */
export function failUnfinishedSteps(steps: ImportSteps): void {
    for (const step of Object.values(steps)) {
        if (step.status === 'pending' || step.status === 'processing') {
            step.status = 'failed';
            step.message = SKIPPED_MESSAGE;
        }
    }
}

/**
 * Import Orchestrator - Runs one invoice file through extraction, ledger
 * creation and voucher import, tracking a status per step.
 *
 * Only an extraction failure stops the run early. The returned result never
 * has a step left pending.
 */
export async function runImport(
    filePath: string,
    ctx: PipelineContext,
    deps: ImportDependencies
): Promise<ImportResult> {
    const { logger, config } = ctx;
    const startedAt = ctx.clock();
    const steps = initialSteps();
    const trail: StepEntry[] = [];

    const result: ImportResult = {
        runId: uuidv4(),
        runKey: formatRunKey(startedAt),
        sourceFile: path.basename(filePath),
        success: false,
        overallStatus: 'failed',
        steps,
        trail,
        pagesProcessed: 0,
    };

    const record = (step: StepName, details: string) => {
        trail.push(createStepEntry(step, details, ctx.clock()));
    };

    logger.info(`Starting import for ${result.sourceFile} (run ${result.runKey})`);

    // Step 1: Extraction
    let invoice: InvoiceRecord;
    steps.extraction.status = 'processing';
    try {
        const pages = await deps.extractor.extractPages(filePath);
        invoice = mergeExtractions(pages);
        result.pagesProcessed = pages.length;
        result.invoice = invoice;

        steps.extraction.status = 'success';
        steps.extraction.message = `Extracted data from ${pages.length} page(s)`;
        steps.extraction.data = {
            pages: pages.length,
            invoiceNumber: invoice.invoiceNumber,
            vendorName: invoice.vendorName,
            totalAmount: invoice.totalAmount,
        };
        record('extraction', steps.extraction.message);
    } catch (err) {
        const message = errorMessage(err);
        steps.extraction.status = 'failed';
        steps.extraction.message = `Extraction failed: ${message}`;
        failUnfinishedSteps(steps);
        record('extraction', steps.extraction.message);

        logger.error(`Processing error for ${result.sourceFile}: ${message}`);
        result.error = message;
        return result;
    }

    try {
        // Step 2: Connectivity probe, informational only
        steps.connectivity.status = 'processing';
        const probe = await deps.client.probe();
        if (probe.ok) {
            steps.connectivity.status = 'success';
            steps.connectivity.message = probe.message;
        } else {
            steps.connectivity.status = 'failed';
            steps.connectivity.message = probe.error.message;
            logger.warn(probe.error.message);
        }
        record('connectivity', steps.connectivity.message);

        // Step 3: Ledgers, best effort
        steps.ledgerCreation.status = 'processing';
        const ledgers = requiredLedgers(invoice);
        const outcomes = await createRequiredLedgers(deps.client, ledgers, {
            concurrency: config.posting.ledgerConcurrency,
            logger,
        });
        const created = outcomes.filter(o => o.ok).length;

        steps.ledgerCreation.status = 'success';
        steps.ledgerCreation.message = `Attempted ${outcomes.length} ledger(s): ${created} created, ${outcomes.length - created} failed`;
        steps.ledgerCreation.data = {
            vendorLedger: ledgers[0].name,
            itemLedgers: ledgers.slice(2).map(l => l.name),
            outcomes: outcomes.map(o => ({ name: o.ledger.name, ok: o.ok, message: o.message })),
        };
        record('ledgerCreation', steps.ledgerCreation.message);

        // Step 4: Voucher
        steps.voucherCreation.status = 'processing';
        const voucher = synthesizeVoucher(invoice, synthesisOptions(ctx));
        const xml = serializeXml(voucherEnvelope(voucher, deps.client.company));
        result.voucherXml = xml;

        logger.info(`Importing voucher ${voucher.voucherNumber} to ${deps.client.endpoint}`);
        const posted = await deps.client.importVoucher(xml);
        if (posted.ok) {
            steps.voucherCreation.status = 'success';
            steps.voucherCreation.message = posted.provisional
                ? 'Import accepted without confirmation marker'
                : 'Voucher created successfully';
            result.success = true;
        } else {
            steps.voucherCreation.status = 'failed';
            steps.voucherCreation.message = `Voucher creation failed: ${posted.error.message}`;
            result.error = posted.error.message;
            logger.error(steps.voucherCreation.message);
        }
        steps.voucherCreation.data = {
            voucherNumber: voucher.voucherNumber,
            itemized: voucher.itemized,
            amountNormalized: voucher.amountNormalized,
            entries: voucher.entries.length,
        };
        record('voucherCreation', steps.voucherCreation.message);
    } catch (err) {
        const message = errorMessage(err);
        failUnfinishedSteps(steps);
        logger.error(`Processing error for ${result.sourceFile}: ${message}`);
        result.error = message;
    }

    result.overallStatus = result.success ? 'success' : 'partial_success';

    // Step 5: Persist
    if (deps.store) {
        try {
            const saved = await deps.store.save({
                runId: result.runId,
                runKey: result.runKey,
                sourceFile: result.sourceFile,
                invoice,
                voucherXml: result.voucherXml,
                status: result.overallStatus,
                steps,
                createdAt: startedAt.toISOString(),
            });
            result.jsonFile = saved.jsonFile;
            result.xmlFile = saved.xmlFile;
        } catch (err) {
            result.persistenceError = errorMessage(err);
            logger.error(result.persistenceError);
        }
    }

    logger.info(`Finished ${result.sourceFile}: ${result.success ? 'SUCCESS' : 'FAILED'}`);
    return result;
}

function unsupportedFileResult(filePath: string, ctx: PipelineContext): ImportResult {
    const steps = initialSteps();
    const message = `Invalid file type: ${path.basename(filePath)}`;
    steps.extraction = { status: 'failed', message };
    failUnfinishedSteps(steps);
    return {
        runId: uuidv4(),
        runKey: formatRunKey(ctx.clock()),
        sourceFile: path.basename(filePath),
        success: false,
        overallStatus: 'failed',
        steps,
        trail: [createStepEntry('extraction', message, ctx.clock())],
        pagesProcessed: 0,
        error: message,
    };
}

/** Files are processed one after another; one failure never stops the rest. */
export async function runBatch(
    filePaths: string[],
    ctx: PipelineContext,
    deps: ImportDependencies
): Promise<BatchResult> {
    const results: ImportResult[] = [];

    for (const filePath of filePaths) {
        if (!isSupportedFile(filePath)) {
            ctx.logger.warn(`Skipping unsupported file ${filePath}`);
            results.push(unsupportedFileResult(filePath, ctx));
            continue;
        }
        results.push(await runImport(filePath, ctx, deps));
    }

    const successfulFiles = results.filter(r => r.success).length;
    return {
        totalFiles: filePaths.length,
        successfulFiles,
        failedFiles: filePaths.length - successfulFiles,
        results,
    };
}

export interface VoucherPreview {
    invoice: InvoiceRecord;
    pagesProcessed: number;
    voucher: VoucherDocument;
    xml: string;
}

/** Extraction and synthesis only; nothing is sent to the accounting system. */
export async function previewImport(
    filePath: string,
    ctx: PipelineContext,
    extractor: Extractor
): Promise<VoucherPreview> {
    const pages = await extractor.extractPages(filePath);
    const invoice = mergeExtractions(pages);
    const voucher = synthesizeVoucher(invoice, synthesisOptions(ctx));
    return { invoice, pagesProcessed: pages.length, voucher, xml: serializeXml(voucherEnvelope(voucher, ctx.config.accounting.companyName)) };
}
