import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import pdfParse from 'pdf-parse/lib/pdf-parse.js';
import type { PaperCandidate } from '../types/index.js';
import { ExtractionError, NotFoundError } from '../utils/errors.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { extractArxivId } from '../sources/utils.js';

const ARXIV_PDF_BASE = 'https://arxiv.org/pdf';

export interface IngestResult {
    pdfPath: string;
    text: string;
}

export interface PaperIngestorOptions {
    /** Directory downloaded PDFs are written to */
    pdfDir: string;
    httpClient?: HttpClient;
}

/**
 * Downloads paper PDFs and extracts their text.
 */
export class PaperIngestor {
    readonly pdfDir: string;
    private httpClient: HttpClient;

    constructor(options: PaperIngestorOptions) {
        this.pdfDir = options.pdfDir;
        this.httpClient = options.httpClient ?? getHttpClient();
        mkdirSync(this.pdfDir, { recursive: true });
    }

    /**
     * Download the candidate's PDF from arXiv and extract its text.
     */
    async ingest(candidate: PaperCandidate): Promise<IngestResult> {
        const arxivId = extractArxivId(candidate.id);
        if (!arxivId) {
            throw new ExtractionError(`Not an arXiv paper: ${candidate.id}`);
        }

        const url = `${ARXIV_PDF_BASE}/${arxivId}`;
        getLogger().info({ url }, 'Downloading PDF');

        const pdf = await this.httpClient.download(url, { source: 'arxiv', timeout: 120000 });
        const pdfPath = join(this.pdfDir, `${arxivId.replace(/\//g, '_')}.pdf`);
        writeFileSync(pdfPath, pdf);
        getLogger().debug({ pdfPath, bytes: pdf.length }, 'PDF saved');

        return { pdfPath, text: await extractPdfText(pdf) };
    }

    /**
     * Extract text from a PDF already on disk.
     * @throws NotFoundError if the file does not exist
     */
    async ingestLocal(pdfPath: string): Promise<string> {
        if (!existsSync(pdfPath)) {
            throw new NotFoundError('pdf', pdfPath);
        }
        return extractPdfText(readFileSync(pdfPath));
    }
}

/**
 * Extract the text of every page of a PDF.
 * @throws ExtractionError if the PDF cannot be read or holds no text
 */
export async function extractPdfText(pdf: Buffer): Promise<string> {
    let text: string;
    try {
        const result = await pdfParse(pdf);
        text = result.text;
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ExtractionError(`Failed to extract text: ${reason}`, { cause: error });
    }

    if (!text.trim()) {
        throw new ExtractionError('No text extracted from PDF');
    }
    return text;
}
