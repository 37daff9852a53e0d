/**
 * @fileoverview Analysis Controller
 *
 * HTTP endpoints for LLM-powered protocol review.
 */

import { Body, Controller, Get, HttpCode, Post, UploadedFile, UseInterceptors } from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { ApiBody, ApiConsumes, ApiOperation, ApiTags } from '@nestjs/swagger';
import { AnalysisService, ProvidersResponse } from './analysis.service';
import { ExtractReagentsRequestDto, GenerateFixRequestDto, ImproveProtocolRequestDto } from './dto';
import {
    AnalysisResponse,
    FixSuggestionResponse,
    ImprovedProtocolResponse,
    ShoppingListResponse,
} from './serializers';

@ApiTags('analysis')
@Controller('api')
export class AnalysisController {
    constructor(private analysisService: AnalysisService) { }

    /**
     * Analyzes an uploaded PDF protocol for issues and success probability.
     */
    @Post('analyze')
    @HttpCode(200)
    @UseInterceptors(FileInterceptor('file'))
    @ApiConsumes('multipart/form-data')
    @ApiBody({ schema: { type: 'object', properties: { file: { type: 'string', format: 'binary' } } } })
    @ApiOperation({ summary: 'Protocol risk assessment', description: 'Upload a PDF protocol (max 20MB)' })
    async analyze(@UploadedFile() file?: Express.Multer.File): Promise<AnalysisResponse> {
        return this.analysisService.analyzeUpload(file);
    }

    @Post('fix')
    @HttpCode(200)
    @ApiOperation({ summary: 'Generate a fix for one identified issue' })
    async generateFix(@Body() request: GenerateFixRequestDto): Promise<FixSuggestionResponse> {
        return this.analysisService.generateFix(request);
    }

    @Post('improve')
    @HttpCode(200)
    @ApiOperation({ summary: 'Apply selected fixes to the protocol' })
    async improveProtocol(@Body() request: ImproveProtocolRequestDto): Promise<ImprovedProtocolResponse> {
        return this.analysisService.improveProtocol(request);
    }

    @Post('reagents')
    @HttpCode(200)
    @ApiOperation({ summary: 'Shopping list from the Materials section' })
    async extractReagents(@Body() request: ExtractReagentsRequestDto): Promise<ShoppingListResponse> {
        return this.analysisService.extractReagents(request);
    }

    /**
     * Lists the supported backends and the one this process was started with.
     */
    @Get('providers')
    @ApiOperation({ summary: 'Available LLM providers' })
    providers(): ProvidersResponse {
        return this.analysisService.providers();
    }
}
