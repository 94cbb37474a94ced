import type { Request } from 'express';
import type { AuthenticatedIdentity } from '../../../../../../libs/common/src';

export interface RequestWithIdentity extends Request {
  user?: AuthenticatedIdentity;
}
