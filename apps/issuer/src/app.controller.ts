import { Controller, Get } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { publicDecorator } from './common/decorators/public.decorator';

@ApiTags('Health')
@Controller()
export class AppController {
  @publicDecorator()
  @Get('health')
  getHealth() {
    return {
      status: 'healthy',
      service: 'auth-service',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    };
  }
}
