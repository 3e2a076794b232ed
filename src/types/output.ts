import type { InvoiceRecord } from './invoice.js';

// Output Contract Types
export type StepState = 'pending' | 'processing' | 'success' | 'failed';

export interface StepStatus {
    status: StepState;
    message: string;
    data?: Record<string, unknown>;
}

export type StepName = 'extraction' | 'connectivity' | 'ledgerCreation' | 'voucherCreation';

export type ImportSteps = Record<StepName, StepStatus>;

export interface StepEntry {
    step: StepName;
    timestamp: string;
    details: string;
}

export type OverallStatus = 'success' | 'partial_success' | 'failed';

export interface ImportResult {
    runId: string;
    runKey: string;
    sourceFile: string;
    success: boolean;
    overallStatus: OverallStatus;
    steps: ImportSteps;
    trail: StepEntry[];
    invoice?: InvoiceRecord;
    pagesProcessed: number;
    voucherXml?: string;
    jsonFile?: string;
    xmlFile?: string;
    error?: string;
    persistenceError?: string;
}

export interface BatchResult {
    totalFiles: number;
    successfulFiles: number;
    failedFiles: number;
    results: ImportResult[];
}

export interface HistoryEntry {
    id: string;
    runKey: string;
    sourceFile: string;
    invoiceNumber: string | null;
    vendorName: string | null;
    totalAmount: number | null;
    status: OverallStatus;
    jsonFile: string;
    xmlFile: string | null;
    createdAt: string;
}
