import type { Config } from "../src/config.js";

export function makeTestConfig(overrides: Partial<Config> = {}): Config {
  return {
    HOST: "127.0.0.1",
    PORT: 0,
    ADMIN_HOST: "127.0.0.1",
    ADMIN_PORT: 0,
    LOG_LEVEL: "silent",
    SHUTDOWN_GRACE_MS: 100,

    DOMAIN_SUFFIX: "test",
    UPSTREAM_HOST_SUFFIX: "",
    DEFAULT_UPSTREAM_PORT: 80,

    ALLOWED_PORTS: "80,443,1024-65535",
    DENY_CIDRS: "169.254.0.0/16",
    ALLOW_CIDRS: "127.0.0.1/32",
    ALLOW_PRIVATE_IPS: false,

    CONNECT_TIMEOUT_MS: 1_000,
    IDLE_TIMEOUT_MS: 2_000,
    REQUEST_HEAD_TIMEOUT_MS: 1_000,
    POOL_IDLE_TIMEOUT_MS: 5_000,
    POOL_MAX_IDLE_PER_DESTINATION: 4,
    MAX_HEAD_BYTES: 16 * 1024,

    FORWARDED_HEADERS: true,

    ...overrides,
  };
}
