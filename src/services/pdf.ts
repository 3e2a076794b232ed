import { createCanvas } from '@napi-rs/canvas';
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { ExtractionError, errorMessage } from '../utils/errors.js';

type PdfDocument = Awaited<ReturnType<typeof getDocument>['promise']>;

/** Multiplier on the PDF's 72 dpi page size. */
export const PAGE_SCALE = 2.0;

async function openDocument(data: Uint8Array): Promise<PdfDocument> {
    try {
        return await getDocument({ data }).promise;
    } catch (err) {
        const msg = errorMessage(err);
        if (msg.includes('password') || msg.includes('encrypted')) {
            throw new ExtractionError('This PDF is password-protected. Remove the protection and try again.', { cause: err });
        }
        throw new ExtractionError(`PDF processing failed: ${msg}`, { cause: err });
    }
}

/** Renders every page of a PDF to a PNG image, in page order. */
export async function renderPdfPages(data: Uint8Array, scale: number = PAGE_SCALE): Promise<Buffer[]> {
    const pdf = await openDocument(data);
    const images: Buffer[] = [];

    try {
        for (let i = 1; i <= pdf.numPages; i++) {
            const page = await pdf.getPage(i);
            const viewport = page.getViewport({ scale });

            const canvas = createCanvas(Math.ceil(viewport.width), Math.ceil(viewport.height));
            await page.render({ canvasContext: canvas.getContext('2d'), viewport }).promise;

            images.push(canvas.toBuffer('image/png'));
            page.cleanup();
        }
    } finally {
        await pdf.destroy();
    }

    return images;
}
