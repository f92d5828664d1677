import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
    TextExtractorService,
    UnsupportedResumeFormatError
} from '../../../src/services/text-extractor.service';
import { createMockLogger } from '../../helpers/fixtures';

// Mock the logger
vi.mock('../../../src/config/logger', () => ({
    logger: {
        info: vi.fn(),
        error: vi.fn(),
        warn: vi.fn(),
        debug: vi.fn()
    }
}));

// pdf-parse reads a bundled test file when imported directly
vi.mock('pdf-parse', () => ({
    default: vi.fn()
}));

describe('TextExtractorService', () => {
    const mockFileReader = {
        readFileSync: vi.fn()
    };
    const mockParsePdf = vi.fn();

    let mockLogger: ReturnType<typeof createMockLogger>;
    let service: TextExtractorService;

    beforeEach(() => {
        vi.clearAllMocks();
        mockLogger = createMockLogger();
        service = new TextExtractorService(mockFileReader, mockParsePdf, mockLogger);
    });

    it('should extract text from a PDF', async () => {
        const buffer = Buffer.from('%PDF-1.4 test');
        mockFileReader.readFileSync.mockReturnValue(buffer);
        mockParsePdf.mockResolvedValue({ text: 'Jane Doe\nBuilt APIs in Python 3.10' });

        const text = await service.extract('/uploads/resume.pdf');

        expect(text).toBe('Jane Doe\nBuilt APIs in Python 3.10');
        expect(mockFileReader.readFileSync).toHaveBeenCalledWith('/uploads/resume.pdf');
        expect(mockParsePdf).toHaveBeenCalledWith(buffer);
        expect(mockLogger.info).toHaveBeenCalledWith(
            { filePath: '/uploads/resume.pdf', textLength: 34 },
            'Resume text extracted'
        );
    });

    it('should use the mime type when the file name has no extension', async () => {
        mockFileReader.readFileSync.mockReturnValue(Buffer.from('%PDF-1.4 test'));
        mockParsePdf.mockResolvedValue({ text: 'Resume' });

        await expect(service.extract('/uploads/abc123', 'application/pdf')).resolves.toBe('Resume');
        expect(mockParsePdf).toHaveBeenCalledTimes(1);
    });

    it('should read plain text and markdown as UTF-8', async () => {
        mockFileReader.readFileSync.mockReturnValue(Buffer.from('Résumé: Python 3.10', 'utf8'));

        await expect(service.extract('/uploads/resume.txt')).resolves.toBe('Résumé: Python 3.10');
        await expect(service.extract('/uploads/resume.MD')).resolves.toBe('Résumé: Python 3.10');
        await expect(service.extract('/uploads/abc123', 'text/plain')).resolves.toBe('Résumé: Python 3.10');
        expect(mockParsePdf).not.toHaveBeenCalled();
    });

    it('should reject unsupported formats', async () => {
        mockFileReader.readFileSync.mockReturnValue(Buffer.from('binary'));

        await expect(service.extract('/uploads/resume.docx')).rejects.toThrow(UnsupportedResumeFormatError);
        await expect(service.extract('/uploads/resume.docx')).rejects.toThrow(
            'Unsupported resume format: resume.docx. Use PDF, .txt or .md'
        );
    });

    it('should reject a file with no extractable text', async () => {
        mockFileReader.readFileSync.mockReturnValue(Buffer.from('%PDF-1.4 scanned'));
        mockParsePdf.mockResolvedValue({ text: ' \n\n ' });

        await expect(service.extract('/uploads/scan.pdf')).rejects.toThrow('No extractable text in scan.pdf');
    });

    it('should propagate parser failures', async () => {
        mockFileReader.readFileSync.mockReturnValue(Buffer.from('not a pdf'));
        mockParsePdf.mockRejectedValue(new Error('Invalid PDF structure'));

        await expect(service.extract('/uploads/broken.pdf')).rejects.toThrow('Invalid PDF structure');
    });
});
