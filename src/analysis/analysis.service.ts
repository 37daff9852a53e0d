/**
 * @fileoverview Analysis Service
 *
 * Orchestrates upload validation, text extraction and the selected LLM provider.
 */

import { BadRequestException, Inject, Injectable, Logger } from '@nestjs/common';
import { Counter } from 'prom-client';
import { PdfTextService } from '../extraction';
import { LLM_PROVIDER, LLMProvider, ProviderName } from './interfaces';
import { ProviderRegistry } from './providers';
import { isDegradedAnalysis } from './parsing';
import {
    AnalysisResponse,
    FixSuggestionResponse,
    ImprovedProtocolResponse,
    ShoppingListResponse,
    toAnalysisResponse,
    toFixSuggestionResponse,
    toImprovedProtocolResponse,
    toShoppingListResponse,
} from './serializers';
import { ExtractReagentsRequestDto, GenerateFixRequestDto, ImproveProtocolRequestDto } from './dto';

export const MAX_UPLOAD_BYTES = 20 * 1024 * 1024;

const analysisCounter = new Counter({
    name: 'protocol_analyses_total',
    help: 'Total number of protocol analyses',
    labelNames: ['provider', 'outcome'],
});

/**
 * Minimal view of an uploaded file; satisfied by `Express.Multer.File`.
 */
export interface UploadedDocument {
    originalname: string;
    size: number;
    buffer: Buffer;
}

export interface ProvidersResponse {
    available: ProviderName[];
    current: ProviderName;
}

@Injectable()
export class AnalysisService {
    private readonly logger = new Logger(AnalysisService.name);

    constructor(
        @Inject(LLM_PROVIDER)
        private readonly llmProvider: LLMProvider,
        private readonly pdfTextService: PdfTextService,
        private readonly registry: ProviderRegistry,
    ) { }

    /**
     * Validates an uploaded PDF, extracts its text and runs the risk assessment.
     */
    async analyzeUpload(file: UploadedDocument | undefined): Promise<AnalysisResponse> {
        this.validateUpload(file);

        const protocolText = await this.pdfTextService.extract(file.buffer);
        if (!protocolText.trim()) {
            throw new BadRequestException("Could not extract text from PDF. Make sure it's not a scanned image.");
        }

        const provider = this.llmProvider.getName();
        try {
            const result = await this.llmProvider.analyze(protocolText);
            const outcome = isDegradedAnalysis(result) ? 'degraded' : 'success';
            analysisCounter.inc({ provider, outcome });
            this.logger.log({
                msg: 'Protocol analyzed',
                provider,
                outcome,
                file: file.originalname,
                successProbability: result.successProbability,
            });
            return toAnalysisResponse(result);
        } catch (error) {
            analysisCounter.inc({ provider, outcome: 'error' });
            throw error;
        }
    }

    async generateFix(request: GenerateFixRequestDto): Promise<FixSuggestionResponse> {
        const fix = await this.llmProvider.generateFix(request.issue, request.description, request.protocol_context);
        return toFixSuggestionResponse(fix);
    }

    async improveProtocol(request: ImproveProtocolRequestDto): Promise<ImprovedProtocolResponse> {
        const fixes = request.fixes_to_apply.map((fix) => ({
            issue: fix.issue,
            description: fix.description,
            fixSuggestion: fix.fix_suggestion,
            implementationSteps: fix.implementation_steps,
        }));
        const improved = await this.llmProvider.improveProtocol(request.original_protocol, fixes);
        return toImprovedProtocolResponse(improved);
    }

    async extractReagents(request: ExtractReagentsRequestDto): Promise<ShoppingListResponse> {
        const list = await this.llmProvider.extractReagents(request.protocol_text);
        return toShoppingListResponse(list);
    }

    providers(): ProvidersResponse {
        return {
            available: this.registry.names(),
            current: this.llmProvider.getName(),
        };
    }

    private validateUpload(file: UploadedDocument | undefined): asserts file is UploadedDocument {
        if (!file) {
            throw new BadRequestException('No file uploaded');
        }
        if (!file.originalname.toLowerCase().endsWith('.pdf')) {
            throw new BadRequestException('Only PDF files are supported');
        }
        if (file.size > MAX_UPLOAD_BYTES) {
            throw new BadRequestException('File size exceeds 20MB limit');
        }
    }
}
