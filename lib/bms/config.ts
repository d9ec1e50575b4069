export type BmsConfig = {
  address: string;
  name: string;
  pollMs: number;
  responseTimeoutMs: number;
  connectAttempts: number;
  connectRetryMs: number;
  connectTimeoutMs: number;
  scanTimeoutMs: number;
  deviceFreshMs: number;
};

function intFromEnv(value: string | undefined, fallback: number) {
  const n = parseInt(value || "", 10);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

export function loadBmsConfig(env: NodeJS.ProcessEnv = process.env): BmsConfig {
  const address = (env.ADDR || "").trim().toLowerCase();
  return {
    address,
    name: (env.NAME || "").trim() || address,
    pollMs: intFromEnv(env.POLL_MS, 30000),
    responseTimeoutMs: intFromEnv(env.RESPONSE_TIMEOUT_MS, 10000),
    connectAttempts: intFromEnv(env.CONNECT_ATTEMPTS, 3),
    connectRetryMs: intFromEnv(env.CONNECT_RETRY_MS, 1000),
    connectTimeoutMs: intFromEnv(env.CONNECT_TIMEOUT_MS, 15000),
    scanTimeoutMs: intFromEnv(env.SCAN_TIMEOUT_MS, 10000),
    deviceFreshMs: intFromEnv(env.DEVICE_FRESH_MS, 60000),
  };
}
