export const INITIAL_PING_DELAY_MS = 10_000;

/**
 * Free hosting tiers (Render) put a service to sleep after ~15 minutes
 * without traffic. Pinging the public URL counts as incoming traffic.
 * Returns a function that stops the pings.
 */
export function startKeepAlive(baseUrl: string, intervalMs: number, fetchImpl: typeof fetch = fetch): () => void {
    const pingUrl = `${baseUrl}/`;
    console.log(`[Keep-Alive] Pinging ${pingUrl} every ${intervalMs / 60000} minutes...`);

    const ping = async () => {
        const timestamp = new Date().toISOString();
        try {
            const res = await fetchImpl(pingUrl);
            if (!res.ok) {
                console.warn(`[Keep-Alive] Warning: Received status ${res.status} at ${timestamp}`);
            }
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            console.error(`[Keep-Alive] Error at ${timestamp}: ${message}`);
        }
    };
    // ping() handles its own failures
    const trigger = () => void ping();

    // Initial ping after startup, once the server is reachable
    const initial = setTimeout(trigger, INITIAL_PING_DELAY_MS);
    const periodic = setInterval(trigger, intervalMs);
    initial.unref();
    periodic.unref();

    return () => {
        clearTimeout(initial);
        clearInterval(periodic);
    };
}
