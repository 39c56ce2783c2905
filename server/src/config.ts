import path from 'path';
import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const DEFAULT_DOCRAPTOR_API_URL = 'https://api.docraptor.com';

export interface ServerConfig {
    port: number;
    host: string;
    iccProfilesDir: string;
    docRaptorApiUrl: string;
    docRaptorTimeoutMs: number;
    maxBodySize: string;
}

function toPositiveInt(value: string | undefined, fallback: number): number {
    if (!value) return fallback;
    const parsed = Number(value);
    return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * Read server configuration from the environment.
 * The DocRaptor API key is never read here: it arrives with each request.
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
    return {
        port: toPositiveInt(env.PORT, 8080),
        host: env.HOST || '0.0.0.0',
        // ICC profiles live beside the server sources unless overridden
        iccProfilesDir: env.ICC_PROFILES_DIR || path.join(__dirname, '..', 'icc_profiles'),
        docRaptorApiUrl: (env.DOCRAPTOR_API_URL || DEFAULT_DOCRAPTOR_API_URL).replace(/\/$/, ''),
        docRaptorTimeoutMs: toPositiveInt(env.DOCRAPTOR_TIMEOUT_MS, 60_000),
        maxBodySize: env.MAX_BODY_SIZE || '50mb',
    };
}
