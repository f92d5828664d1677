import * as fs from 'fs';
import * as path from 'path';
import pdf from 'pdf-parse';
import { logger, type ILogger } from '../config/logger';

export type PdfParser = (data: Buffer) => Promise<{ text: string }>;

export interface IFileReader {
    readFileSync(path: string): Buffer;
}

export interface ITextExtractor {
    extract(filePath: string, mimeType?: string): Promise<string>;
}

const TEXT_EXTENSIONS = new Set(['.txt', '.md']);

export class UnsupportedResumeFormatError extends Error {
    constructor(public readonly filePath: string) {
        super(`Unsupported resume format: ${path.basename(filePath)}. Use PDF, .txt or .md`);
        this.name = 'UnsupportedResumeFormatError';
    }
}

/**
 * Text Extractor Service with Dependency Injection
 *
 * Turns an uploaded resume into plain text. PDFs go through pdf-parse;
 * plain text and markdown are read as UTF-8.
 */
export class TextExtractorService implements ITextExtractor {
    constructor(
        private fileReader: IFileReader,
        private parsePdf: PdfParser,
        private logger: ILogger
    ) { }

    /**
     * Factory method for production use
     */
    static create(): TextExtractorService {
        return new TextExtractorService(fs, pdf, logger);
    }

    async extract(filePath: string, mimeType?: string): Promise<string> {
        const extension = path.extname(filePath).toLowerCase();
        const buffer = this.fileReader.readFileSync(filePath);

        let text: string;
        if (extension === '.pdf' || mimeType === 'application/pdf') {
            const pdfData = await this.parsePdf(buffer);
            text = pdfData.text;
        } else if (TEXT_EXTENSIONS.has(extension) || mimeType === 'text/plain' || mimeType === 'text/markdown') {
            text = buffer.toString('utf8');
        } else {
            throw new UnsupportedResumeFormatError(filePath);
        }

        if (!text || text.trim().length === 0) {
            throw new Error(`No extractable text in ${path.basename(filePath)}`);
        }

        this.logger.info({
            filePath,
            textLength: text.length
        }, 'Resume text extracted');

        return text;
    }
}

// Singleton instance
let textExtractorService: TextExtractorService | null = null;

export function getTextExtractorService(): TextExtractorService {
    if (!textExtractorService) {
        textExtractorService = TextExtractorService.create();
    }
    return textExtractorService;
}
