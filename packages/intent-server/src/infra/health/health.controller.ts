import { Controller, Get, Inject } from '@nestjs/common';

import { SERVICE_NAME, TOOLSET_VERSION } from '../../core/constants';
import { Tmf921Client } from '../../tmf921/tmf921.client';
import { ToolsRegistry } from '../../tools/tools.registry';

@Controller('health')
export class HealthController {
  constructor(@Inject(Tmf921Client) private readonly backend: Tmf921Client) {}

  @Get()
  async getHealth(): Promise<{
    status: string;
    timestamp: string;
    toolsetVersion: string;
    backend: {
      baseUrl: string;
      reachable: boolean;
      status?: number;
    };
  }> {
    const reachability = await this.backend.ping();
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      toolsetVersion: TOOLSET_VERSION,
      backend: {
        baseUrl: this.backend.baseUrl,
        ...reachability,
      },
    };
  }
}

@Controller()
export class ServiceInfoController {
  constructor(@Inject(ToolsRegistry) private readonly registry: ToolsRegistry) {}

  @Get()
  getInfo(): { service: string; version: string; status: 'ready'; toolsAvailable: string[] } {
    return {
      service: SERVICE_NAME,
      version: TOOLSET_VERSION,
      status: 'ready',
      toolsAvailable: this.registry.names(),
    };
  }
}
