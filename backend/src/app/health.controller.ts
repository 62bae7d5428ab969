import { Controller, Get, ServiceUnavailableException } from '@nestjs/common';

import { DatabaseService } from '../database/database.service';

export interface HealthStatus {
  status: 'ok';
  database: 'connected';
  timestamp: string;
}

@Controller('health')
export class HealthController {
  constructor(private readonly databaseService: DatabaseService) {}

  @Get()
  async check(): Promise<HealthStatus> {
    const connected = await this.databaseService.ping();
    if (!connected) {
      throw new ServiceUnavailableException('Database connection error. Please try again.');
    }
    return { status: 'ok', database: 'connected', timestamp: new Date().toISOString() };
  }
}
