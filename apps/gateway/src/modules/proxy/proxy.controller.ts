import {
  All,
  BadGatewayException,
  Controller,
  InternalServerErrorException,
  Param,
  Req,
  Res,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import type { Response } from 'express';
import { GatewayAuthGuard } from '../auth/gateway-auth.guard';
import type { GatewayRequest } from '../auth/gateway-request.interface';
import { ProxyForwarderService } from './proxy-forwarder.service';
import { BackendUnavailableError, InternalProxyError } from './proxy.errors';

@ApiTags('Proxy')
@ApiBearerAuth()
@Controller()
@UseGuards(GatewayAuthGuard)
export class ProxyController {
  constructor(private readonly forwarder: ProxyForwarderService) {}

  @All([':service', ':service/*'])
  @ApiOperation({ summary: 'Forward an authenticated request to a backend service' })
  async proxy(
    @Param('service') service: string,
    @Req() req: GatewayRequest,
    @Res() res: Response,
  ): Promise<void> {
    try {
      await this.forwarder.forward(service, req, res);
    } catch (err) {
      if (err instanceof BackendUnavailableError) {
        throw new BadGatewayException(err.message);
      }
      if (err instanceof InternalProxyError) {
        throw new InternalServerErrorException('Failed to build the upstream request');
      }
      throw err;
    }
  }
}
