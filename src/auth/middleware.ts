import { FastifyRequest, FastifyReply } from 'fastify';

/**
 * Credentials of the caller. The Google access token is issued and refreshed
 * by an upstream OAuth flow and passed in as a Bearer token.
 */
export interface UserContext {
  accessToken: string;
}

declare module 'fastify' {
  interface FastifyRequest {
    userContext?: UserContext;
  }
}

function getWwwAuthenticateHeader(): string {
  return 'Bearer realm="docs-edit-gateway"';
}

export function readBearerToken(authorization: string | undefined): string | undefined {
  if (!authorization?.startsWith('Bearer ')) {
    return undefined;
  }
  const token = authorization.slice(7).trim();
  return token.length > 0 ? token : undefined;
}

export async function requireAuth(
  request: FastifyRequest,
  reply: FastifyReply
): Promise<void> {
  const token = readBearerToken(request.headers.authorization);

  if (!token) {
    console.log(`[Auth] Missing Bearer token on ${request.method} ${request.url}`);
    reply
      .code(401)
      .header('WWW-Authenticate', getWwwAuthenticateHeader())
      .send({
        error: 'authentication_required',
        message: 'Send a Google access token as a Bearer token'
      });
    return;
  }

  request.userContext = { accessToken: token };
}
