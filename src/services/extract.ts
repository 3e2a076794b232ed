import * as fs from 'fs/promises';
import * as path from 'path';
import axios, { type AxiosInstance, type CreateAxiosDefaults } from 'axios';
import type { InvoiceRecord } from '../types/invoice.js';
import type { AppConfig } from '../config.js';
import { requireExtractionToken } from '../config.js';
import { pageExtractionSchema, toInvoiceRecord } from './extractionSchema.js';
import { ExtractionError, PipelineError, errorMessage } from '../utils/errors.js';

/** Upstream collaborator: one structured record per invoice page. */
export interface Extractor {
    extractPages(filePath: string): Promise<InvoiceRecord[]>;
}

export const IMAGE_EXTENSIONS = ['.jpg', '.jpeg', '.png'];
export const SUPPORTED_EXTENSIONS = [...IMAGE_EXTENSIONS, '.pdf', '.json'];

const EXTRACTION_PROMPT = `Extract invoice data and return ONLY valid JSON with this structure:
{
    "invoice_number": "",
    "date": "",
    "vendor_name": "",
    "vendor_address": "",
    "total_amount": 0.0,
    "tax_amount": 0.0,
    "line_items": [
        { "description": "", "quantity": 0, "rate": 0.0, "amount": 0.0 }
    ]
}`;

export function isSupportedFile(filePath: string): boolean {
    return SUPPORTED_EXTENSIONS.includes(path.extname(filePath).toLowerCase());
}

function stripCodeFences(s: string): string {
    const m = s.match(/```(?:json)?\s*([\s\S]*?)\s*```/i);
    return m ? m[1] : s;
}

function tryParse(s: string): unknown {
    try {
        return JSON.parse(s);
    } catch {
        return undefined;
    }
}

/** Parses model output that may wrap the JSON in prose or a fenced block. */
export function extractJsonLenient(s: string): unknown {
    const direct = tryParse(s);
    if (direct !== undefined) return direct;

    const unfenced = stripCodeFences(s);
    const fenced = tryParse(unfenced);
    if (fenced !== undefined) return fenced;

    const i = unfenced.indexOf('{');
    const j = unfenced.lastIndexOf('}');
    if (i !== -1 && j > i) {
        return tryParse(unfenced.slice(i, j + 1));
    }
    return undefined;
}

export function parsePage(raw: unknown, source: string): InvoiceRecord {
    const parsed = pageExtractionSchema.safeParse(raw);
    if (!parsed.success) {
        const problems = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
        throw new ExtractionError(`Unusable extraction from ${source}: ${problems}`);
    }
    return toInvoiceRecord(parsed.data);
}

interface ChatCompletion {
    choices?: { message?: { content?: string } }[];
}

/** Turns a PDF into one PNG image per page, in page order. */
export type PdfPageRenderer = (pdf: Uint8Array) => Promise<Buffer[]>;

const renderWithPdfjs: PdfPageRenderer = async pdf => {
    const { renderPdfPages } = await import('./pdf.js');
    return renderPdfPages(pdf);
};

export interface FileExtractorOptions {
    /** Extra axios settings for the vision call; tests pass an `adapter` here. */
    axiosDefaults?: CreateAxiosDefaults;
    renderPdfPages?: PdfPageRenderer;
}

/**
 * Reads page extractions from disk (.json) or asks a vision model to extract
 * them from page images. PDFs are rendered page by page first.
 */
export class FileExtractor implements Extractor {
    private readonly http: AxiosInstance;
    private readonly renderPdfPages: PdfPageRenderer;

    constructor(private readonly config: AppConfig, options: FileExtractorOptions = {}) {
        this.http = axios.create(options.axiosDefaults);
        this.renderPdfPages = options.renderPdfPages ?? renderWithPdfjs;
    }

    async extractPages(filePath: string): Promise<InvoiceRecord[]> {
        const ext = path.extname(filePath).toLowerCase();

        try {
            if (ext === '.json') return await this.readJsonPages(filePath);
            if (ext === '.pdf') return await this.extractPdf(filePath);
            if (IMAGE_EXTENSIONS.includes(ext)) return [await this.extractImage(filePath)];
        } catch (err) {
            if (err instanceof PipelineError) throw err;
            throw new ExtractionError(`Extraction failed for ${path.basename(filePath)}: ${errorMessage(err)}`, { cause: err });
        }

        throw new ExtractionError(`Unsupported file type: ${ext || '(none)'}`);
    }

    private async readJsonPages(filePath: string): Promise<InvoiceRecord[]> {
        const content = await fs.readFile(filePath, 'utf-8');
        const data = extractJsonLenient(content);
        if (data === undefined) {
            throw new ExtractionError(`${path.basename(filePath)} does not contain JSON`);
        }
        const pages = Array.isArray(data) ? data : [data];
        return pages.map((page, i) => parsePage(page, `${path.basename(filePath)} page ${i + 1}`));
    }

    private async extractPdf(filePath: string): Promise<InvoiceRecord[]> {
        requireExtractionToken(this.config);
        const name = path.basename(filePath);
        const images = await this.renderPdfPages(new Uint8Array(await fs.readFile(filePath)));
        if (images.length === 0) {
            throw new ExtractionError(`${name} has no pages`);
        }

        const pages: InvoiceRecord[] = [];
        for (const [i, image] of images.entries()) {
            pages.push(await this.extractPageImage(image, 'image/png', `${name} page ${i + 1}`));
        }
        return pages;
    }

    private async extractImage(filePath: string): Promise<InvoiceRecord> {
        const image = await fs.readFile(filePath);
        const mime = path.extname(filePath).toLowerCase() === '.png' ? 'image/png' : 'image/jpeg';
        return this.extractPageImage(image, mime, path.basename(filePath));
    }

    private async extractPageImage(image: Buffer, mime: string, source: string): Promise<InvoiceRecord> {
        const token = requireExtractionToken(this.config);

        const payload = {
            model: this.config.extraction.model,
            max_tokens: 4092,
            messages: [{
                role: 'user',
                content: [
                    { type: 'text', text: EXTRACTION_PROMPT },
                    { type: 'image_url', image_url: { url: `data:${mime};base64,${image.toString('base64')}` } },
                ],
            }],
        };

        const { data } = await this.http.post<ChatCompletion>(this.config.extraction.apiUrl, payload, {
            headers: { 'Content-Type': 'application/json', Authorization: `Bearer ${token}` },
            timeout: 90_000,
        });

        const text = data.choices?.[0]?.message?.content?.trim() ?? '';
        const parsed = extractJsonLenient(text);
        if (parsed === undefined) {
            throw new ExtractionError(`Model returned non-JSON output: ${text.slice(0, 200)}`);
        }
        return parsePage(parsed, source);
    }
}
