// OpenTelemetry must be imported FIRST before any other imports
import './shared/tracing/tracing';
import 'reflect-metadata';

import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { Logger } from 'nestjs-pino';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { APP_NAME, APP_VERSION } from './app.controller';

async function bootstrap() {
    const app = await NestFactory.create(AppModule, { bufferLogs: true });

    // Use Pino logger
    app.useLogger(app.get(Logger));

    const config = app.get(ConfigService);
    app.enableCors({
        origin: config.get<string>('CORS_ORIGINS', '').split(',').map((origin) => origin.trim()).filter(Boolean),
        credentials: true,
    });

    // Swagger API documentation
    const document = SwaggerModule.createDocument(
        app,
        new DocumentBuilder()
            .setTitle(APP_NAME)
            .setDescription('Risk assessment of experimental protocols by interchangeable LLM providers')
            .setVersion(APP_VERSION)
            .addTag('analysis', 'Protocol analysis and follow-up operations')
            .addTag('health', 'Service status')
            .build(),
    );
    SwaggerModule.setup('api-docs', app, document);

    const port = config.get<number>('PORT', 8000);
    await app.listen(port);

    app.get(Logger).log(`${APP_NAME} running on http://localhost:${port}`);
}

bootstrap().catch((error: unknown) => {
    console.error('Failed to start', error instanceof Error ? error.message : error);
    process.exit(1);
});
