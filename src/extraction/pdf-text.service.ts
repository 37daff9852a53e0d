/**
 * @fileoverview PDF Text Service
 *
 * Extracts plain text from uploaded PDF bytes. Scanned (image-only) documents yield
 * empty text; there is no OCR.
 */

import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import pdfParse from 'pdf-parse';

@Injectable()
export class PdfTextService {
    private readonly logger = new Logger(PdfTextService.name);

    /**
     * @returns Text of all pages, pages separated by blank lines by pdf-parse
     * @throws BadRequestException when the bytes are not a readable, unencrypted PDF
     */
    async extract(pdf: Buffer): Promise<string> {
        try {
            const result = await pdfParse(pdf);
            this.logger.debug({ msg: 'PDF text extracted', pages: result.numpages, chars: result.text.length });
            return result.text;
        } catch (error) {
            this.logger.warn({ msg: 'PDF text extraction failed', error: error instanceof Error ? error.message : String(error) });

            if (error instanceof Error && error.name === 'PasswordException') {
                throw new BadRequestException('PDF is encrypted. Please provide an unencrypted file.');
            }
            const detail = error instanceof Error ? error.message : String(error);
            throw new BadRequestException(`Invalid or corrupted PDF file: ${detail}`);
        }
    }
}
