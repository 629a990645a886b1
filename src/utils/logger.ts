import { appendFile, mkdir } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

const MAX_ENTRY_LENGTH = 4_000;
const SENSITIVE_ENV_PATTERN = /(KEY|TOKEN|SECRET|PASSWORD|PASSWD|CREDENTIAL)/i;
const MIN_SECRET_LENGTH = 6;
const INLINE_SECRET_PATTERNS: RegExp[] = [
    /\b((?:api[_-]?key|token|secret|password|passwd)\s*[=:]\s*)([^\s'"]+)/gi,
    /\b(Bearer\s+)([A-Za-z0-9._~+/=-]+)/g,
];

function resolveLogDir(): string {
    const configured = process.env.AETHER_LOG_DIR?.trim();
    if (configured) {
        return path.resolve(configured);
    }
    return path.join(os.homedir(), '.aether', 'logs');
}

function dailyLogPath(now: Date): string {
    return path.join(resolveLogDir(), `${now.toISOString().slice(0, 10)}.md`);
}

function collectSensitiveEnvValues(): string[] {
    const values: string[] = [];
    for (const [name, value] of Object.entries(process.env)) {
        if (!value || value.length < MIN_SECRET_LENGTH) continue;
        if (SENSITIVE_ENV_PATTERN.test(name)) {
            values.push(value);
        }
    }
    // Longest first so overlapping secrets are fully replaced.
    return values.sort((left, right) => right.length - left.length);
}

/**
 * Redact secret material from free-form text before it is persisted or
 * mirrored to event consumers.
 */
export function scrubSensitiveText(text: string): string {
    let scrubbed = text;
    for (const secret of collectSensitiveEnvValues()) {
        scrubbed = scrubbed.split(secret).join('[REDACTED]');
    }
    for (const pattern of INLINE_SECRET_PATTERNS) {
        scrubbed = scrubbed.replace(pattern, (_match, prefix: string) => `${prefix}[REDACTED]`);
    }
    return scrubbed;
}

function truncate(text: string): string {
    if (text.length <= MAX_ENTRY_LENGTH) return text;
    return `${text.slice(0, MAX_ENTRY_LENGTH)}\n...[truncated]`;
}

async function appendEntry(entry: string): Promise<void> {
    const now = new Date();
    const target = dailyLogPath(now);
    try {
        await mkdir(path.dirname(target), { recursive: true });
        await appendFile(target, `- [${now.toISOString().slice(11, 19)}] ${entry}\n`, 'utf8');
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[Logger] Failed to write log entry to ${target}: ${message}`);
    }
}

/** Append a diagnostic line to today's log. */
export async function logThought(message: string): Promise<void> {
    await appendEntry(truncate(scrubSensitiveText(message)));
}

/** Record a subprocess invocation together with its merged output and exit code. */
export async function logSystemCommand(
    command: string,
    output: string,
    exitCode: number,
): Promise<void> {
    const body = truncate(scrubSensitiveText(output.trim() || '(no output)'));
    const indented = body
        .split('\n')
        .map((line) => `    ${line}`)
        .join('\n');
    await appendEntry(`\`${scrubSensitiveText(command)}\` exited ${exitCode}\n${indented}`);
}
