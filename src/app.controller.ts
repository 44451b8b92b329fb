import { Controller, Get, Logger, ServiceUnavailableException } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { SkipThrottle } from '@nestjs/throttler';
import { DataSource } from 'typeorm';

@ApiTags('health')
@Controller()
export class AppController {
  private readonly logger = new Logger(AppController.name);

  constructor(private readonly dataSource: DataSource) {}

  @Get('health')
  @SkipThrottle()
  @ApiOperation({ summary: 'Verificar a saúde da aplicação' })
  @ApiResponse({ status: 200, description: 'Aplicação e banco de dados disponíveis' })
  @ApiResponse({ status: 503, description: 'Banco de dados indisponível' })
  async health(): Promise<{ status: 'ok'; database: 'up'; timestamp: string }> {
    try {
      await this.dataSource.query('SELECT 1');
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`Health check failed: ${errorMessage}`);
      throw new ServiceUnavailableException('Database unavailable');
    }

    return { status: 'ok', database: 'up', timestamp: new Date().toISOString() };
  }
}
