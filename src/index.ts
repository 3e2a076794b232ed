import { loadConfig, type ConfigOverrides } from './config.js';
import { createContext, type PipelineContext } from './context.js';
import { AccountingClient } from './services/accountingClient.js';
import { FileExtractor, type Extractor } from './services/extract.js';
import { runBatch, runImport, type ImportDependencies } from './services/orchestrator.js';
import { ResultsStore } from './store/resultsStore.js';
import type { BatchResult, HistoryEntry, ImportResult } from './types/output.js';
import type { Logger } from './utils/logger.js';

export interface InvoiceProcessorOptions extends ConfigOverrides {
    env?: Record<string, string | undefined>;
    logger?: Logger;
    extractor?: Extractor;
    persist?: boolean;
}

/**
 * Invoice Processor - wires configuration, transport and storage for a
 * sequence of invoice files and runs each through the import pipeline.
 */
export class InvoiceProcessor {
    private constructor(
        readonly ctx: PipelineContext,
        private readonly deps: ImportDependencies
    ) {}

    static async create(options: InvoiceProcessorOptions = {}): Promise<InvoiceProcessor> {
        const config = loadConfig(options.env ?? process.env, options);
        const ctx = createContext(config, options.logger);

        const client = new AccountingClient({
            host: config.accounting.host,
            port: config.accounting.port,
            company: config.accounting.companyName,
        });
        const store = options.persist === false ? undefined : await ResultsStore.open(config.resultsDir);

        return new InvoiceProcessor(ctx, {
            extractor: options.extractor ?? new FileExtractor(config),
            client,
            store,
        });
    }

    processFile(filePath: string): Promise<ImportResult> {
        return runImport(filePath, this.ctx, this.deps);
    }

    processFiles(filePaths: string[]): Promise<BatchResult> {
        return runBatch(filePaths, this.ctx, this.deps);
    }

    history(limit?: number): HistoryEntry[] {
        return this.deps.store?.listHistory(limit) ?? [];
    }

    shutdown(): void {
        this.deps.store?.close();
    }
}

// Export all types
export * from './types/index.js';
export { loadConfig, loadEnvFile, type AppConfig } from './config.js';
export { createContext, type PipelineContext } from './context.js';
export { createLogger, silentLogger, type Logger } from './utils/logger.js';
export * from './utils/errors.js';
export { sanitize } from './utils/sanitize.js';
export { mergeExtractions } from './services/merge.js';
export { requiredLedgers, createLedger, createRequiredLedgers } from './services/ledgers.js';
export { synthesizeVoucher, currentDatePolicy, formatPostingDate, type PostingDatePolicy, type SynthesisOptions } from './services/voucher.js';
export { AccountingClient, classifyImportResponse, type PostResult, type RawResponse } from './services/accountingClient.js';
export { FileExtractor, type Extractor } from './services/extract.js';
export { runImport, runBatch, previewImport, type ImportDependencies } from './services/orchestrator.js';
export { ResultsStore } from './store/resultsStore.js';
export type { RunStore, RunRecord, SavedFiles } from './store/resultsStore.js';
export { serializeXml, element, textElement } from './xml/document.js';
export { ledgerEnvelope, voucherEnvelope } from './xml/envelopes.js';
