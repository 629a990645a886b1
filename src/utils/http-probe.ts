export interface HttpProbeResult {
    ok: boolean;
    detail: string;
    statusCode?: number;
}

/** Single GET against `url`; only HTTP 200 counts as healthy. */
export type HttpProbe = (url: string) => Promise<HttpProbeResult>;

const DEFAULT_PROBE_TIMEOUT_MS = 2_000;

export async function probeHttp(url: string, timeoutMs = DEFAULT_PROBE_TIMEOUT_MS): Promise<HttpProbeResult> {
    try {
        const response = await fetch(url, {
            method: 'GET',
            signal: AbortSignal.timeout(timeoutMs),
        });
        // Drain the body so the connection is released.
        await response.arrayBuffer();
        if (response.status !== 200) {
            return {
                ok: false,
                detail: `${url} returned HTTP ${response.status}.`,
                statusCode: response.status,
            };
        }
        return { ok: true, detail: `${url} returned HTTP 200.`, statusCode: 200 };
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return { ok: false, detail: `${url} unreachable: ${message}` };
    }
}
