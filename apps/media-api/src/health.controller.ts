/**
 * Health Controller
 * Health check endpoint
 */

import { Controller, Get } from '@nestjs/common';

export const SERVICE_NAME = 'cloud-media-api';
export const SERVICE_VERSION = '1.0.0';

@Controller('health')
export class HealthController {
  @Get()
  health() {
    return {
      status: 'healthy',
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
    };
  }
}
