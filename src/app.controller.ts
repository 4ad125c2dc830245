import { Controller, Get } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { ApiTags } from '@nestjs/swagger';
import { DataSource } from 'typeorm';

export interface HealthStatus {
  status: 'ok';
  store: 'connected' | 'disconnected';
  timestamp: string;
}

@ApiTags('Health')
@Controller()
export class AppController {
  constructor(@InjectDataSource() private readonly ds: Pick<DataSource, 'isInitialized'>) {}

  @Get('health')
  getHealth(): HealthStatus {
    return {
      status: 'ok',
      store: this.ds.isInitialized ? 'connected' : 'disconnected',
      timestamp: new Date().toISOString(),
    };
  }
}
