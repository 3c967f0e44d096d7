import { Controller, Get, Inject } from '@nestjs/common';
import { HealthCheck, HealthCheckService, MemoryHealthIndicator } from '@nestjs/terminus';
import type { JobRegistryPort } from '../application/ports/output/job-registry.port';
import { JOB_REGISTRY_PORT } from '../application/ports/output/injection-tokens';
import { ConversionPoolService } from '../conversion-pool/conversion-pool.service';
import type { PoolStats } from '../conversion-pool/interfaces/pool-stats.interface';
import { ConversionPoolHealthIndicator } from './indicators/conversion-pool.health';
import { DiskSpaceHealthIndicator } from './indicators/disk-space.health';
import { ToolsHealthIndicator } from './indicators/tools.health';

export interface ServiceHealthResponse {
  status: 'ok' | 'degraded';
  tools: {
    converter: boolean;
    rasterizer: boolean;
  };
  jobs: number;
  pool: PoolStats;
}

const HEAP_LIMIT_BYTES = 1024 * 1024 * 1024; // 1GB

@Controller('health')
export class HealthController {
  constructor(
    @Inject(HealthCheckService) private readonly health: HealthCheckService,
    @Inject(MemoryHealthIndicator) private readonly memory: MemoryHealthIndicator,
    @Inject(ToolsHealthIndicator) private readonly toolsHealth: ToolsHealthIndicator,
    @Inject(ConversionPoolHealthIndicator)
    private readonly conversionPoolHealth: ConversionPoolHealthIndicator,
    @Inject(DiskSpaceHealthIndicator) private readonly diskSpaceHealth: DiskSpaceHealthIndicator,
    @Inject(ConversionPoolService) private readonly conversionPool: ConversionPoolService,
    @Inject(JOB_REGISTRY_PORT) private readonly jobRegistry: JobRegistryPort,
  ) {}

  /**
   * Always answers 200; missing tools only degrade the status.
   */
  @Get()
  async check(): Promise<ServiceHealthResponse> {
    const [tools, jobs] = await Promise.all([
      this.toolsHealth.detect(),
      this.jobRegistry.count(),
    ]);
    const pool = this.conversionPool.getStats();

    return {
      status: tools.converter.available && tools.rasterizer.available ? 'ok' : 'degraded',
      tools: {
        converter: tools.converter.available,
        rasterizer: tools.rasterizer.available,
      },
      jobs,
      pool,
    };
  }

  @Get('live')
  @HealthCheck()
  liveness() {
    // Simple liveness check - just verify the service is running
    return this.health.check([() => this.memory.checkHeap('memory_heap', HEAP_LIMIT_BYTES)]);
  }

  @Get('ready')
  @HealthCheck()
  readiness() {
    // Readiness check - verify every job could actually be processed
    return this.health.check([
      () => this.toolsHealth.isHealthy('tools'),
      () => this.conversionPoolHealth.isHealthy('conversion_pool'),
      () => this.diskSpaceHealth.isHealthy('disk_space'),
    ]);
  }
}
