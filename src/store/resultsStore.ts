import * as fs from 'fs/promises';
import * as path from 'path';
import { RunDatabase } from '../db/connection.js';
import type { InvoiceRecord } from '../types/invoice.js';
import type { HistoryEntry, ImportSteps, OverallStatus } from '../types/output.js';
import { PersistenceError, errorMessage } from '../utils/errors.js';

export interface RunRecord {
    runId: string;
    runKey: string;
    sourceFile: string;
    invoice: InvoiceRecord;
    voucherXml?: string;
    status: OverallStatus;
    steps: ImportSteps;
    createdAt: string;
}

export interface SavedFiles {
    jsonFile: string;
    xmlFile?: string;
}

/** Second-resolution key shared by a run's JSON and XML files. */
export function formatRunKey(date: Date): string {
    const pad = (n: number) => String(n).padStart(2, '0');
    return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
        `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

/** Where finished runs are kept. */
export interface RunStore {
    save(run: RunRecord): Promise<SavedFiles>;
    listHistory(limit?: number): HistoryEntry[];
    close(): void;
}

/**
 * Writes `invoice_<key>.json` and `voucher_<key>.xml` into the results
 * directory and indexes the run for the history listing.
 */
export class ResultsStore implements RunStore {
    private constructor(readonly dir: string, private readonly database: RunDatabase) {}

    static async open(dir: string): Promise<ResultsStore> {
        try {
            await fs.mkdir(dir, { recursive: true });
            const database = await RunDatabase.open(path.join(dir, 'runs.db'));
            return new ResultsStore(dir, database);
        } catch (err) {
            throw new PersistenceError(`Cannot open results store at ${dir}: ${errorMessage(err)}`, { cause: err });
        }
    }

    async save(run: RunRecord): Promise<SavedFiles> {
        const jsonFile = path.join(this.dir, `invoice_${run.runKey}.json`);
        const xmlFile = run.voucherXml !== undefined ? path.join(this.dir, `voucher_${run.runKey}.xml`) : undefined;

        try {
            await fs.writeFile(jsonFile, JSON.stringify(run.invoice, null, 2), 'utf-8');
            if (xmlFile !== undefined && run.voucherXml !== undefined) {
                await fs.writeFile(xmlFile, run.voucherXml, 'utf-8');
            }

            this.database.db.run(`
        INSERT INTO import_runs
        (id, run_key, source_file, invoice_number, vendor_name, total_amount, status, json_file, xml_file, steps, created_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `, [
                run.runId,
                run.runKey,
                run.sourceFile,
                run.invoice.invoiceNumber ?? null,
                run.invoice.vendorName ?? null,
                run.invoice.totalAmount ?? null,
                run.status,
                path.basename(jsonFile),
                xmlFile ? path.basename(xmlFile) : null,
                JSON.stringify(run.steps),
                run.createdAt,
            ]);
            this.database.save();
        } catch (err) {
            throw new PersistenceError(`Failed to save results for run ${run.runKey}: ${errorMessage(err)}`, { cause: err });
        }

        return { jsonFile, xmlFile };
    }

    /** Newest first. */
    listHistory(limit = 200): HistoryEntry[] {
        const result = this.database.db.exec(
            `SELECT * FROM import_runs ORDER BY created_at DESC, rowid DESC LIMIT ?`,
            [limit]
        );

        if (result.length === 0) return [];

        const columns = result[0].columns;
        const getCol = (row: unknown[], name: string) => {
            const idx = columns.indexOf(name);
            return idx >= 0 ? row[idx] : null;
        };
        const str = (row: unknown[], name: string) => {
            const value = getCol(row, name);
            return typeof value === 'string' ? value : null;
        };
        const num = (row: unknown[], name: string) => {
            const value = getCol(row, name);
            return typeof value === 'number' ? value : null;
        };

        return result[0].values.map(row => ({
            id: str(row, 'id') ?? '',
            runKey: str(row, 'run_key') ?? '',
            sourceFile: str(row, 'source_file') ?? '',
            invoiceNumber: str(row, 'invoice_number'),
            vendorName: str(row, 'vendor_name'),
            totalAmount: num(row, 'total_amount'),
            status: parseStatus(str(row, 'status')),
            jsonFile: str(row, 'json_file') ?? '',
            xmlFile: str(row, 'xml_file'),
            createdAt: str(row, 'created_at') ?? '',
        }));
    }

    close(): void {
        this.database.close();
    }
}

function parseStatus(value: string | null): OverallStatus {
    return value === 'success' || value === 'partial_success' ? value : 'failed';
}
