export interface DatabaseCredentials {
  host: string;
  port?: number;
  user?: string;
  password?: string;
  database: string;
  ssl?: boolean | "require" | "allow" | "prefer" | "verify-full";
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

function toSslOption(mode: string): DatabaseCredentials["ssl"] {
  switch (mode) {
    case "require":
    case "allow":
    case "prefer":
    case "verify-full":
      return mode;
    case "disable":
      return false;
    default:
      return true;
  }
}

/**
 * Splits a postgres URL by hand instead of through `URL`, since pooled Supabase passwords
 * often carry characters that are not URL-safe.
 */
export function parseDatabaseUrl(raw: string): DatabaseCredentials {
  const protocolIndex = raw.indexOf("://");
  if (protocolIndex < 0) {
    throw new Error("DATABASE_URL must include a protocol");
  }

  const withoutProtocol = raw.slice(protocolIndex + 3);
  const atIndex = withoutProtocol.lastIndexOf("@");
  if (atIndex < 0) {
    throw new Error("DATABASE_URL must include credentials and a host");
  }

  const authPart = withoutProtocol.slice(0, atIndex);
  const hostAndPath = withoutProtocol.slice(atIndex + 1);
  const slashIndex = hostAndPath.indexOf("/");
  if (slashIndex < 0) {
    throw new Error("DATABASE_URL must include a database name");
  }

  const hostPort = hostAndPath.slice(0, slashIndex);
  const [databasePart, query = ""] = hostAndPath.slice(slashIndex + 1).split("?", 2);
  if (!databasePart) {
    throw new Error("DATABASE_URL must include a database name");
  }

  const colonInAuth = authPart.indexOf(":");
  const user = safeDecode(colonInAuth >= 0 ? authPart.slice(0, colonInAuth) : authPart);
  const password = colonInAuth >= 0 ? authPart.slice(colonInAuth + 1) : undefined;

  const lastColon = hostPort.lastIndexOf(":");
  const hasPort = lastColon > 0 && !hostPort.includes("]");
  const host = hasPort ? hostPort.slice(0, lastColon) : hostPort;
  const port = hasPort ? Number.parseInt(hostPort.slice(lastColon + 1), 10) : Number.NaN;

  const sslParam = query.split("&").find((item) => item.startsWith("sslmode="));
  const sslMode = sslParam ? safeDecode(sslParam.slice("sslmode=".length)) : undefined;

  return {
    host,
    ...(Number.isFinite(port) ? { port } : {}),
    ...(user ? { user } : {}),
    ...(password ? { password } : {}),
    database: safeDecode(databasePart),
    ...(sslMode ? { ssl: toSslOption(sslMode) } : {}),
  };
}
