import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import type { Response } from 'supertest';
import pdfParse from 'pdf-parse';
import { AppModule } from '../src/app.module';
import { LLM_PROVIDER, LLMProvider } from '../src/analysis/interfaces';
import { degradedAnalysis } from '../src/analysis/parsing';
import { TransportError } from '../src/shared/errors';

jest.mock('pdf-parse', () => jest.fn());

/**
 * Runs the full HTTP stack with the LLM backend replaced by an in-process fake.
 * No network access; PDF parsing is mocked.
 */
describe('Protocol Review API E2E Tests', () => {
    let app: INestApplication;

    const fakeProvider: jest.Mocked<LLMProvider> = {
        analyze: jest.fn(),
        generateFix: jest.fn(),
        improveProtocol: jest.fn(),
        extractReagents: jest.fn(),
        supportsStructuredOutput: jest.fn().mockReturnValue(true),
        getName: jest.fn().mockReturnValue('openai'),
    };

    const pdf = Buffer.from('%PDF-1.4 test document');

    beforeAll(async () => {
        const moduleFixture: TestingModule = await Test.createTestingModule({
            imports: [AppModule],
        })
            .overrideProvider(LLM_PROVIDER)
            .useValue(fakeProvider)
            .compile();

        app = moduleFixture.createNestApplication({ logger: false });
        await app.init();
    });

    afterAll(async () => {
        await app.close();
    });

    beforeEach(() => {
        fakeProvider.analyze.mockReset();
        jest.mocked(pdfParse).mockResolvedValue({
            numpages: 1,
            numrender: 1,
            info: {},
            metadata: null,
            version: 'default',
            text: 'Materials: PBS\n1. Wash cells twice.',
        });
    });

    describe('Service Endpoints', () => {
        it('GET / - should return the service banner', () => {
            return request(app.getHttpServer())
                .get('/')
                .expect(200)
                .expect({ app: 'Protocol Review API', version: '1.0.0', status: 'running' });
        });

        it('GET /health - should report healthy', () => {
            return request(app.getHttpServer()).get('/health').expect(200).expect({ status: 'healthy' });
        });

        it('GET /api/providers - should list backends and the active one', () => {
            return request(app.getHttpServer())
                .get('/api/providers')
                .expect(200)
                .expect({ available: ['groq', 'claude', 'openai'], current: 'openai' });
        });
    });

    describe('Analyze Endpoint', () => {
        it('POST /api/analyze - should return the analysis contract', async () => {
            fakeProvider.analyze.mockResolvedValue({
                successProbability: 68,
                criticalIssues: [{ title: 'Missing negative control', description: 'No untreated wells.' }],
                warnings: [],
                passedChecks: [{ title: 'Safety', description: 'Gloves required.' }],
                estimatedCost: '$150',
                estimatedTime: '4 hours',
                suggestions: ['Add untreated wells.'],
                rawModelOutput: '{"success_probability": 68}',
            });

            const res: Response = await request(app.getHttpServer())
                .post('/api/analyze')
                .attach('file', pdf, 'protocol.pdf')
                .expect(200);

            expect(fakeProvider.analyze).toHaveBeenCalledWith('Materials: PBS\n1. Wash cells twice.');
            expect(res.body).toEqual({
                success_probability: 68,
                critical_issues: [{ issue: 'Missing negative control', description: 'No untreated wells.' }],
                warnings: [],
                passed_checks: [{ check: 'Safety', description: 'Gloves required.' }],
                estimated_cost: '$150',
                estimated_time: '4 hours',
                suggestions: ['Add untreated wells.'],
            });
        });

        it('POST /api/analyze - should return degraded analyses with 200', async () => {
            fakeProvider.analyze.mockResolvedValue(degradedAnalysis('Looks fine to me.'));

            const res: Response = await request(app.getHttpServer())
                .post('/api/analyze')
                .attach('file', pdf, 'protocol.pdf')
                .expect(200);

            expect(res.body.success_probability).toBe(0);
            expect(res.body.estimated_time).toBe('unknown');
            expect(res.text).not.toContain('Looks fine to me.');
        });

        it('POST /api/analyze - should reject non-PDF uploads', async () => {
            const res: Response = await request(app.getHttpServer())
                .post('/api/analyze')
                .attach('file', Buffer.from('plain text'), 'protocol.txt')
                .expect(400);

            expect(res.body.message).toBe('Only PDF files are supported');
            expect(fakeProvider.analyze).not.toHaveBeenCalled();
        });

        it('POST /api/analyze - should reject a request without a file', async () => {
            const res: Response = await request(app.getHttpServer()).post('/api/analyze').expect(400);

            expect(res.body.message).toBe('No file uploaded');
        });

        it('POST /api/analyze - should reject scanned PDFs', async () => {
            jest.mocked(pdfParse).mockResolvedValue({
                numpages: 1,
                numrender: 1,
                info: {},
                metadata: null,
                version: 'default',
                text: '\n\n',
            });

            const res: Response = await request(app.getHttpServer())
                .post('/api/analyze')
                .attach('file', pdf, 'scan.pdf')
                .expect(400);

            expect(res.body.message).toBe("Could not extract text from PDF. Make sure it's not a scanned image.");
        });

        it('POST /api/analyze - should map rate limits to 503', async () => {
            fakeProvider.analyze.mockRejectedValue(
                new TransportError('openai', 'rate_limit', 'openai request failed (HTTP 429): Rate limit reached', 429),
            );

            const res: Response = await request(app.getHttpServer())
                .post('/api/analyze')
                .attach('file', pdf, 'protocol.pdf')
                .expect(503);

            expect(res.body).toEqual({
                statusCode: 503,
                error: 'TransportError',
                message: 'openai request failed (HTTP 429): Rate limit reached',
                provider: 'openai',
                failure: 'rate_limit',
            });
        });

        it('POST /api/analyze - should map rejected credentials to 502', async () => {
            fakeProvider.analyze.mockRejectedValue(
                new TransportError('openai', 'authentication', 'openai rejected the configured credential (HTTP 401)', 401),
            );

            const res: Response = await request(app.getHttpServer())
                .post('/api/analyze')
                .attach('file', pdf, 'protocol.pdf')
                .expect(502);

            expect(res.body.failure).toBe('authentication');
        });
    });

    describe('Follow-up Endpoints', () => {
        it('POST /api/fix - should validate the request body', async () => {
            const res: Response = await request(app.getHttpServer())
                .post('/api/fix')
                .send({ issue: 'Missing control', description: 'No untreated wells' })
                .expect(400);

            expect(res.body.message).toContain('protocol_context should not be empty');
            expect(fakeProvider.generateFix).not.toHaveBeenCalled();
        });

        it('POST /api/fix - should return the suggested fix', () => {
            fakeProvider.generateFix.mockResolvedValue({
                fixSuggestion: 'Add a DMSO-only well.',
                implementationSteps: ['Reserve well A1'],
            });

            return request(app.getHttpServer())
                .post('/api/fix')
                .send({ issue: 'Missing control', description: 'No untreated wells', protocol_context: '1. Treat.' })
                .expect(200)
                .expect({ fix_suggestion: 'Add a DMSO-only well.', implementation_steps: ['Reserve well A1'] });
        });

        it('POST /api/improve - should require at least one fix', () => {
            return request(app.getHttpServer())
                .post('/api/improve')
                .send({ original_protocol: '1. Treat.', fixes_to_apply: [] })
                .expect(400);
        });

        it('POST /api/reagents - should return the shopping list', () => {
            fakeProvider.extractReagents.mockResolvedValue({
                categories: [
                    {
                        name: 'Buffers & Solutions',
                        items: [{ name: 'PBS', concentration: '1X', quantity: '1 L', estimatedPrice: 35, checked: false }],
                    },
                ],
                totalCost: 35,
            });

            return request(app.getHttpServer())
                .post('/api/reagents')
                .send({ protocol_text: 'Materials: PBS 1X, 1 L' })
                .expect(200)
                .expect({
                    categories: [
                        {
                            name: 'Buffers & Solutions',
                            items: [{ name: 'PBS', concentration: '1X', quantity: '1 L', estimated_price: 35, checked: false }],
                        },
                    ],
                    total_cost: 35,
                });
        });
    });

    describe('Metrics Endpoint', () => {
        it('GET /metrics - should return Prometheus metrics', () => {
            return request(app.getHttpServer())
                .get('/metrics')
                .expect(200)
                .expect((res: Response) => {
                    expect(res.text).toContain('protocol_analyses_total');
                    expect(res.text).toContain('nodejs_heap');
                });
        });
    });
});
