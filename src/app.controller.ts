import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';

export const APP_NAME = 'Protocol Review API';
export const APP_VERSION = '1.0.0';

@ApiTags('health')
@Controller()
export class AppController {
    @Get()
    @ApiOperation({ summary: 'Service banner' })
    root(): { app: string; version: string; status: string } {
        return { app: APP_NAME, version: APP_VERSION, status: 'running' };
    }

    @Get('health')
    @ApiOperation({ summary: 'Health check' })
    health(): { status: string } {
        return { status: 'healthy' };
    }
}
