import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';

const REDACTED = '[REDACTED]';

/** Environment keys whose raw values must never reach a log line. */
const SENSITIVE_ENV_KEYS = ['TELEGRAM_BOT_TOKEN', 'API_SECRET', 'OPENAI_API_KEY', 'ANTHROPIC_API_KEY'];

const KEY_VALUE_PATTERN = /\b([A-Za-z_]*(?:token|secret|password|api[_-]?key)[A-Za-z_]*)\s*[=:]\s*("[^"]*"|'[^']*'|[^\s,;]+)/gi;
const TELEGRAM_TOKEN_PATTERN = /\b\d{6,12}:[A-Za-z0-9_-]{30,}\b/g;
const BEARER_PATTERN = /\bBearer\s+[A-Za-z0-9._~+/=-]{8,}/g;

/** Redact secret-looking values from free-form text. */
export function scrubSensitiveText(text: string): string {
    let scrubbed = text
        .replace(KEY_VALUE_PATTERN, (_match, key: string) => `${key}=${REDACTED}`)
        .replace(TELEGRAM_TOKEN_PATTERN, REDACTED)
        .replace(BEARER_PATTERN, `Bearer ${REDACTED}`);

    for (const key of SENSITIVE_ENV_KEYS) {
        const value = process.env[key];
        if (value && value.length >= 8) {
            scrubbed = scrubbed.split(value).join(REDACTED);
        }
    }

    return scrubbed;
}

function resolveLogDir(): string {
    return process.env.PACING_LOG_DIR
        ? path.resolve(process.env.PACING_LOG_DIR)
        : path.join(process.cwd(), 'logs');
}

/**
 * Append a line to today's delivery log (`<logDir>/YYYY-MM-DD.md`).
 *
 * Never throws: a failed write is reported on stderr so callers can fire and forget.
 */
export async function logThought(message: string): Promise<void> {
    const now = new Date();
    const logDir = resolveLogDir();
    const logFile = path.join(logDir, `${now.toISOString().slice(0, 10)}.md`);
    const line = `- ${now.toISOString()} ${scrubSensitiveText(message)}\n`;

    try {
        await mkdir(logDir, { recursive: true });
        await appendFile(logFile, line, 'utf8');
    } catch (err) {
        console.error('[Logger] Failed to write log entry:', err instanceof Error ? err.message : String(err));
    }
}
