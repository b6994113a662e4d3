import type { MiddlewareHandler } from "hono";
import { ErrorCode } from "../protocol/errors";
import type { AuthenticatedClient, AuthService } from "../utils/auth";
import { createJsonRpcErrorResponse } from "../utils/jsonrpc_helpers";
import { logger } from "../utils/logger";

const authLogger = logger.child({ component: "auth-middleware" });

/**
 * Context extension for authenticated requests
 */
export interface AuthContext {
  auth: AuthenticatedClient | null;
}

/**
 * Extracts credentials (Bearer token and Client ID) from headers.
 */
function extractClientCredentials(headers: Headers): {
  key: string | null;
  clientId: string | null;
} {
  let key: string | null = null;
  const authHeader = headers.get("Authorization");
  if (authHeader && authHeader.toLowerCase().startsWith("bearer ")) {
    key = authHeader.slice(7).trim() || null;
  }

  const clientId = headers.get("X-Client-ID");

  if (key && !clientId) {
    authLogger.warn(
      "Bearer token provided without X-Client-ID header. Authentication will likely fail."
    );
  }

  return { key, clientId };
}

/**
 * Validates credentials and sets the auth context. Failed authentication is
 * answered with 401 when auth is enabled.
 */
export function authentication(
  authService: AuthService
): MiddlewareHandler<{ Variables: AuthContext }> {
  return async (c, next) => {
    const { key, clientId } = extractClientCredentials(c.req.raw.headers);
    const client = await authService.authenticate(clientId, key);

    if (!client) {
      authLogger.debug("Rejected unauthenticated request", {
        hasKey: !!key,
        clientIdProvided: clientId,
        path: c.req.path,
      });
      return c.json(
        createJsonRpcErrorResponse(
          null,
          ErrorCode.InvalidRequest,
          "Authentication failed"
        ),
        401
      );
    }

    c.set("auth", client);
    await next();
  };
}
