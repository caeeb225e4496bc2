import { Nango } from "@nangohq/node";

const nangoHost =
  process.env.NANGO_HOST ||
  process.env.NANGO_SERVER_URL ||
  "http://localhost:3003";
const nangoSecretKey = process.env.NANGO_SECRET_KEY || "";

let nangoClient: Nango | null = null;

/**
 * OAuth providers configured in Nango.
 * Names must match the integration ids set up in the Nango dashboard.
 */
export type NangoProvider = "google-mail";

export function formatNangoError(error: unknown): string {
  if (!error || typeof error !== "object") {
    return String(error);
  }

  const e = error as {
    message?: string;
    code?: string;
    config?: { url?: string };
    errors?: Array<{ message?: string; code?: string }>;
  };

  const parts: string[] = [];

  if (e.message) {
    parts.push(e.message);
  }
  if (e.code) {
    parts.push(`code=${e.code}`);
  }
  if (e.config?.url) {
    parts.push(`url=${e.config.url}`);
  }
  const firstError = Array.isArray(e.errors) ? e.errors[0] : undefined;
  if (firstError?.message) {
    parts.push(`cause=${firstError.message}`);
  }
  if (firstError?.code) {
    parts.push(`causeCode=${firstError.code}`);
  }

  return parts.length > 0 ? parts.join("; ") : String(error);
}

function getNangoClient(): Nango {
  if (!nangoSecretKey) {
    throw new Error("NANGO_SECRET_KEY environment variable not set");
  }

  if (!nangoClient) {
    // Lazy so that importing this module works without Gmail configured
    nangoClient = new Nango({
      secretKey: nangoSecretKey,
      host: nangoHost,
    });
  }

  return nangoClient;
}

/**
 * Get a valid access token for a provider connection.
 * Nango refreshes expired tokens itself.
 *
 * @throws Error if the connection is missing or holds no usable credential
 */
export async function getToken(
  provider: NangoProvider,
  connectionId: string,
): Promise<string> {
  try {
    const connection = await getNangoClient().getConnection(
      provider,
      connectionId,
    );

    const credentials = connection.credentials as Record<string, unknown>;
    if (
      "access_token" in credentials &&
      typeof credentials.access_token === "string"
    ) {
      return credentials.access_token;
    }

    throw new Error(`Unexpected credential type for ${provider}`);
  } catch (error) {
    throw new Error(
      `Failed to fetch ${provider} token for connectionId "${connectionId}" from Nango host "${nangoHost}": ${formatNangoError(error)}`,
    );
  }
}
