/**
 * @fileoverview Application Root Module
 *
 * Configures the NestJS application with logging, metrics, and feature modules.
 */

import { Module, ValidationPipe } from '@nestjs/common';
import { APP_FILTER, APP_PIPE } from '@nestjs/core';
import { LoggerModule } from 'nestjs-pino';
import { PrometheusModule } from '@willsoto/nestjs-prometheus';
import type { TransportTargetOptions } from 'pino';
import { ConfigModule } from './config/config.module';
import { AnalysisModule } from './analysis';
import { AppController } from './app.controller';
import { LlmExceptionFilter } from './shared/filters/llm-exception.filter';

const env = process.env.NODE_ENV ?? 'development';

function logTargets(): TransportTargetOptions[] {
    const targets: TransportTargetOptions[] = [
        { target: 'pino-pretty', level: 'debug', options: { colorize: true } },
    ];
    if (process.env.LOKI_HOST) {
        targets.push({
            target: 'pino-loki',
            level: 'info',
            options: {
                host: process.env.LOKI_HOST,
                labels: { app: 'protocol-review-api' },
                batching: true,
                interval: 5,
            },
        });
    }
    return targets;
}

@Module({
    imports: [
        // Logging
        LoggerModule.forRoot({
            pinoHttp: {
                level: process.env.LOG_LEVEL ?? (env === 'test' ? 'silent' : env === 'production' ? 'info' : 'debug'),
                // JSON output outside development
                transport: env === 'development' ? { targets: logTargets() } : undefined,
                redact: ['req.headers.authorization', 'req.headers.cookie', 'res.headers["set-cookie"]'],
            },
        }),

        // Metrics
        PrometheusModule.register({
            path: '/metrics',
            defaultMetrics: { enabled: true },
        }),

        // Shared modules
        ConfigModule,

        // Feature modules
        AnalysisModule,
    ],
    controllers: [AppController],
    providers: [
        { provide: APP_PIPE, useValue: new ValidationPipe({ whitelist: true, transform: true }) },
        { provide: APP_FILTER, useClass: LlmExceptionFilter },
    ],
})
export class AppModule { }
