import type { IncomingHttpHeaders } from 'http';
import type { AuthenticatedIdentity } from '../../../../../libs/common/src';

export const HOP_BY_HOP_HEADERS = new Set([
  'connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-authorization',
  'proxy-connection',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade',
]);

export const IDENTITY_HEADERS = {
  subjectId: 'x-user-id',
  email: 'x-user-email',
  isAdmin: 'x-user-is-admin',
} as const;

export interface ForwardingContext {
  clientIp: string | undefined;
  host: string | undefined;
  protocol: string;
  correlationId: string | undefined;
  identity: AuthenticatedIdentity | undefined;
}

export type OutboundHeaders = Record<string, string | string[]>;

/** Lists the extra headers named in a Connection header, lower-cased. */
function connectionTokens(headers: IncomingHttpHeaders): Set<string> {
  const raw = headers.connection;
  return new Set(
    (raw ?? '')
      .split(',')
      .map((token) => token.trim().toLowerCase())
      .filter((token) => token.length > 0),
  );
}

/**
 * Builds the headers sent to a backend: the client's headers minus
 * hop-by-hop ones, `host` and `content-length`, plus forwarding headers.
 * Client-supplied `x-user-*` headers never pass through; they are set here
 * from the verified identity only.
 */
export function buildOutboundHeaders(
  incoming: IncomingHttpHeaders,
  context: ForwardingContext,
): OutboundHeaders {
  const dropped = connectionTokens(incoming);
  const headers: OutboundHeaders = {};

  for (const [name, value] of Object.entries(incoming)) {
    const lower = name.toLowerCase();
    if (value === undefined) continue;
    if (HOP_BY_HOP_HEADERS.has(lower) || dropped.has(lower)) continue;
    if (lower === 'host' || lower === 'content-length') continue;
    if (lower.startsWith('x-user-')) continue;
    headers[lower] = value;
  }

  const forwardedFor = incoming['x-forwarded-for'];
  const priorHops = Array.isArray(forwardedFor) ? forwardedFor.join(', ') : forwardedFor;
  if (context.clientIp) {
    headers['x-forwarded-for'] = priorHops
      ? `${priorHops}, ${context.clientIp}`
      : context.clientIp;
  }
  if (context.host) headers['x-forwarded-host'] = context.host;
  headers['x-forwarded-proto'] = context.protocol;
  if (context.correlationId) headers['x-correlation-id'] = context.correlationId;
  // keep bodies byte-identical; the relay does not decode
  if (!headers['accept-encoding']) headers['accept-encoding'] = 'identity';

  if (context.identity) {
    headers[IDENTITY_HEADERS.subjectId] = context.identity.subjectId;
    headers[IDENTITY_HEADERS.email] = context.identity.email;
    headers[IDENTITY_HEADERS.isAdmin] = String(context.identity.isAdmin);
  }

  return headers;
}

/** Response headers to relay to the client, minus hop-by-hop ones. */
export function relayableResponseHeaders(
  headers: Record<string, unknown>,
): OutboundHeaders {
  const relayed: OutboundHeaders = {};
  for (const [name, value] of Object.entries(headers)) {
    const lower = name.toLowerCase();
    if (HOP_BY_HOP_HEADERS.has(lower)) continue;
    if (typeof value === 'string') {
      relayed[lower] = value;
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      relayed[lower] = String(value);
    } else if (Array.isArray(value)) {
      relayed[lower] = value.map((entry) => String(entry));
    }
  }
  return relayed;
}
