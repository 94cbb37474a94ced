import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { AuthenticatedIdentity } from '../../../../../libs/common/src';
import type { RequestWithIdentity } from '../../modules/auth/interfaces/request-with-identity.interface';

/** Injects the identity the JWT strategy attached to the request. */
export const currentUser = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): AuthenticatedIdentity | undefined =>
    ctx.switchToHttp().getRequest<RequestWithIdentity>().user,
);
