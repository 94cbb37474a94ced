import type { Request } from 'express';
import type { AuthenticatedIdentity } from '../../../../../libs/common/src';

export interface GatewayRequest extends Request {
  /** Set by GatewayAuthGuard; absent on anonymous optional-auth requests. */
  identity?: AuthenticatedIdentity;
}
