/**
 * Connection configuration: validation and environment loading.
 */

import type { AuthConfig, ClientConfig, ConnectionContext, Protocol } from "./core/types.js";

export const DEFAULT_HTTP_PORT = 5984;
export const DEFAULT_HTTPS_PORT = 6984;

// Lowercase letter first, then lowercase letters, digits and _$()+-/
const DATABASE_NAME = /^[a-z][a-z0-9_$()+/-]*$/;

export function defaultPort(protocol: Protocol): number {
  return protocol === "https" ? DEFAULT_HTTPS_PORT : DEFAULT_HTTP_PORT;
}

function validateAuth(auth: AuthConfig, errors: string[]): void {
  const hasToken = "token" in auth;
  const hasBasic = "username" in auth || "password" in auth;
  if (hasToken && hasBasic) {
    errors.push("auth must be either username/password or token, not both");
    return;
  }
  if ("token" in auth) {
    if (auth.token.length === 0) {
      errors.push("auth.token may not be empty");
    }
    return;
  }
  if (!auth.username) {
    errors.push("auth.username may not be empty");
  }
  if (typeof auth.password !== "string") {
    errors.push("auth.password must be a string");
  }
}

/**
 * Validates the connection settings and returns them frozen.
 *
 * @throws Error listing every problem found
 */
export function resolveConnectionContext(config: ClientConfig): ConnectionContext {
  const errors: string[] = [];
  const protocol = config.protocol ?? "http";

  if (protocol !== "http" && protocol !== "https") {
    errors.push(`protocol must be "http" or "https", got "${String(protocol)}"`);
  }
  if (!config.host || config.host.trim().length === 0) {
    errors.push("host may not be empty");
  }
  const port = config.port ?? defaultPort(protocol);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    errors.push(`port must be an integer between 1 and 65535, got ${port}`);
  }
  if (!config.database) {
    errors.push("database may not be empty");
  } else if (!DATABASE_NAME.test(config.database)) {
    errors.push(
      `database "${config.database}" is not a valid name (lowercase, starting with a letter)`
    );
  }
  if (config.auth) {
    validateAuth(config.auth, errors);
  }
  if (config.timeout !== undefined && !(Number.isFinite(config.timeout) && config.timeout > 0)) {
    errors.push("timeout must be a positive finite number");
  }

  if (errors.length > 0) {
    throw new Error(`Invalid couchwire configuration:\n  - ${errors.join("\n  - ")}`);
  }

  const context: {
    protocol: Protocol;
    host: string;
    port: number;
    path?: string;
    database: string;
    auth?: Readonly<AuthConfig>;
  } = {
    protocol,
    host: config.host,
    port,
    database: config.database,
  };
  const path = config.path?.replace(/^\/+|\/+$/g, "");
  if (path) {
    context.path = path;
  }
  if (config.auth) {
    context.auth = Object.freeze({ ...config.auth });
  }
  return Object.freeze(context);
}

/**
 * Reads connection settings from COUCHDB_* environment variables.
 * Only values that are set are returned; validation happens in
 * resolveConnectionContext.
 */
export function loadConfigFromEnv(
  env: Record<string, string | undefined> = process.env
): ClientConfig {
  const config: ClientConfig = {
    host: env["COUCHDB_HOST"] ?? "",
    database: env["COUCHDB_DATABASE"] ?? "",
  };

  const protocol = env["COUCHDB_PROTOCOL"];
  if (protocol !== undefined) {
    if (protocol !== "http" && protocol !== "https") {
      throw new Error(`Invalid couchwire configuration:\n  - COUCHDB_PROTOCOL must be "http" or "https", got "${protocol}"`);
    }
    config.protocol = protocol;
  }

  const port = env["COUCHDB_PORT"];
  if (port !== undefined && port.length > 0) {
    config.port = Number(port);
  }

  const path = env["COUCHDB_PATH"];
  if (path) {
    config.path = path;
  }

  const token = env["COUCHDB_TOKEN"];
  const username = env["COUCHDB_USERNAME"];
  if (token) {
    config.auth = { token };
  } else if (username) {
    config.auth = { username, password: env["COUCHDB_PASSWORD"] ?? "" };
  }

  return config;
}
