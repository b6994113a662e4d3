import * as bcrypt from "bcrypt";
import { logger } from "./logger";

const authLogger = logger.child({ component: "auth" });

const SALT_ROUNDS = 10; // Standard salt rounds for bcrypt

export const DEFAULT_CLIENT_ID = "default";

/**
 * Permission level for tools
 */
export type PermissionLevel = "public" | "protected" | "admin";

/**
 * Authenticated user/client information
 */
export interface AuthenticatedClient {
  id: string;
  name: string;
  permissions: PermissionLevel;
  metadata?: Record<string, unknown>;
}

interface ApiKeyRecord {
  keyHash: string;
  client: AuthenticatedClient;
  createdAt: string;
}

export const ANONYMOUS_CLIENT: AuthenticatedClient = {
  id: "anonymous",
  name: "Anonymous Client",
  permissions: "public",
};

/**
 * In-memory API key store. Keys are kept only as bcrypt hashes.
 */
export class ApiKeyStore {
  private records = new Map<string, ApiKeyRecord[]>();

  async registerKey(key: string, client: AuthenticatedClient): Promise<void> {
    if (!key || key.length < 8) {
      throw new Error("API key must be at least 8 characters long");
    }

    const keyHash = await bcrypt.hash(key, SALT_ROUNDS);
    const existing = this.records.get(client.id) ?? [];
    this.records.set(client.id, [
      ...existing,
      { keyHash, client, createdAt: new Date().toISOString() },
    ]);

    authLogger.debug("Registered new API key", {
      clientId: client.id,
      permissions: client.permissions,
    });
  }

  /**
   * Validate a raw API key for a specific client ID against the stored hashes.
   * @returns The authenticated client or null if invalid/not found/mismatch
   */
  async validateKey(
    clientId: string | null,
    key: string | null
  ): Promise<AuthenticatedClient | null> {
    if (!clientId || !key) {
      return null;
    }

    const candidates = this.records.get(clientId) ?? [];
    if (candidates.length === 0) {
      authLogger.debug("No API key found for client ID", { clientId });
      return null;
    }

    for (const record of candidates) {
      if (await bcrypt.compare(key, record.keyHash)) {
        return record.client;
      }
    }

    authLogger.warn("API key validation failed (hash mismatch)", { clientId });
    return null;
  }
}

export class AuthService {
  private readonly apiKeys = new ApiKeyStore();
  private pending: Promise<void> = Promise.resolve();

  constructor(private readonly authEnabled: boolean) {
    if (this.authEnabled) {
      authLogger.info("Authentication is enabled");
    } else {
      authLogger.warn("Authentication is DISABLED - all requests will be allowed");
    }
  }

  get enabled(): boolean {
    return this.authEnabled;
  }

  /**
   * Registers a key. Authentication waits for outstanding registrations.
   */
  registerApiKey(key: string, client: AuthenticatedClient): Promise<void> {
    const registration = this.pending.then(() =>
      this.apiKeys.registerKey(key, client)
    );
    this.pending = registration.catch((error: unknown) => {
      authLogger.error("Failed to register API key", error, {
        clientId: client.id,
      });
    });
    return registration;
  }

  /**
   * Authenticate a request using Client ID and Key
   * @param clientId Client ID from X-Client-ID header
   * @param key API Key / Bearer Token from Authorization header
   */
  async authenticate(
    clientId: string | null,
    key: string | null
  ): Promise<AuthenticatedClient | null> {
    if (!this.authEnabled) {
      return ANONYMOUS_CLIENT;
    }

    await this.pending;
    const client = await this.apiKeys.validateKey(clientId, key);

    if (client) {
      authLogger.debug("Authenticated successfully", { clientId: client.id });
      return client;
    }

    if (clientId || key) {
      authLogger.warn("Authentication failed", {
        clientIdProvided: clientId,
        hasKey: !!key,
      });
    }

    return null;
  }
}

/**
 * Check if a client has the required permission level for an operation
 */
export function hasPermission(
  client: AuthenticatedClient | null,
  requiredLevel: PermissionLevel
): boolean {
  if (!client) return requiredLevel === "public";

  if (client.permissions === "admin") return true;

  if (client.permissions === "protected") {
    return requiredLevel === "protected" || requiredLevel === "public";
  }

  return requiredLevel === "public";
}

/**
 * Builds the auth service and registers configured keys for the default client.
 */
export function createAuthService(options: {
  enabled: boolean;
  apiKeys: string[];
}): AuthService {
  const service = new AuthService(options.enabled);
  for (const key of options.apiKeys) {
    service
      .registerApiKey(key, {
        id: DEFAULT_CLIENT_ID,
        name: "Default Client",
        permissions: "admin",
      })
      .catch((error: unknown) => {
        authLogger.warn("Configured API key was not registered", {
          error: error instanceof Error ? error.message : String(error),
        });
      });
  }
  return service;
}
