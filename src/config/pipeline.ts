import type { Env } from './env.js';
import type { NotificationChannel } from '../types/models.js';

export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
}

export interface GatingPolicy {
  /** Intent must be `buy` with confidence strictly above this value */
  readonly intentThreshold: number;
  /** Product match confidence must be strictly above this value */
  readonly visionThreshold: number;
}

export interface GatewayEndpoint {
  readonly baseUrl: string;
  readonly timeoutMs: number;
}

export interface PipelineConfig {
  readonly gating: GatingPolicy;
  readonly retry: RetryPolicy;
  readonly gateways: {
    readonly intent: GatewayEndpoint;
    readonly vision: GatewayEndpoint;
    readonly order: GatewayEndpoint;
    readonly notification: GatewayEndpoint;
  };
  readonly queue: {
    readonly ttlSeconds: number;
    readonly popTimeoutSeconds: number;
  };
  readonly workers: {
    readonly count: number;
    readonly idleMs: number;
  };
  readonly order: {
    readonly source: string;
    readonly quantity: number;
  };
  readonly notification: {
    readonly channel: NotificationChannel;
  };
  readonly frames: {
    readonly windowSeconds: number;
    readonly limit: number;
  };
}

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = deepFreeze({
  gating: { intentThreshold: 0.5, visionThreshold: 0.7 },
  retry: { maxAttempts: 3, baseDelayMs: 500, maxDelayMs: 8000 },
  gateways: {
    intent: { baseUrl: 'http://nlp-service:8001', timeoutMs: 10000 },
    vision: { baseUrl: 'http://vision-service:8002', timeoutMs: 15000 },
    order: { baseUrl: 'http://ecommerce:8082', timeoutMs: 10000 },
    notification: { baseUrl: 'http://ecommerce:8082', timeoutMs: 10000 },
  },
  queue: { ttlSeconds: 604800, popTimeoutSeconds: 1 },
  workers: { count: 4, idleMs: 1000 },
  order: { source: 'tiktok_live', quantity: 1 },
  notification: { channel: 'whatsapp' },
  frames: { windowSeconds: 10, limit: 5 },
});

/**
 * Build the immutable pipeline configuration from a validated environment.
 */
export function buildPipelineConfig(env: Env): PipelineConfig {
  return deepFreeze({
    gating: {
      intentThreshold: env.INTENT_THRESHOLD,
      visionThreshold: env.VISION_THRESHOLD,
    },
    retry: {
      maxAttempts: env.RETRY_MAX_ATTEMPTS,
      baseDelayMs: env.RETRY_BASE_DELAY_MS,
      maxDelayMs: env.RETRY_MAX_DELAY_MS,
    },
    gateways: {
      intent: { baseUrl: env.INTENT_SERVICE_URL, timeoutMs: env.INTENT_TIMEOUT_MS },
      vision: { baseUrl: env.VISION_SERVICE_URL, timeoutMs: env.VISION_TIMEOUT_MS },
      order: { baseUrl: env.ORDER_SERVICE_URL, timeoutMs: env.ORDER_TIMEOUT_MS },
      notification: { baseUrl: env.NOTIFICATION_SERVICE_URL, timeoutMs: env.NOTIFICATION_TIMEOUT_MS },
    },
    queue: {
      ttlSeconds: env.QUEUE_TTL_SECONDS,
      popTimeoutSeconds: env.QUEUE_POP_TIMEOUT_SECONDS,
    },
    workers: {
      count: env.WORKER_COUNT,
      idleMs: env.WORKER_IDLE_MS,
    },
    order: {
      source: env.ORDER_SOURCE,
      quantity: 1,
    },
    notification: {
      channel: env.NOTIFICATION_CHANNEL,
    },
    frames: {
      windowSeconds: env.VISION_FRAME_WINDOW_SECONDS,
      limit: env.VISION_FRAME_LIMIT,
    },
  });
}

/**
 * Override parts of a config, returning a new frozen copy.
 */
export function withOverrides(
  base: PipelineConfig,
  overrides: { [K in keyof PipelineConfig]?: Partial<PipelineConfig[K]> }
): PipelineConfig {
  return deepFreeze({
    gating: { ...base.gating, ...overrides.gating },
    retry: { ...base.retry, ...overrides.retry },
    gateways: { ...base.gateways, ...overrides.gateways },
    queue: { ...base.queue, ...overrides.queue },
    workers: { ...base.workers, ...overrides.workers },
    order: { ...base.order, ...overrides.order },
    notification: { ...base.notification, ...overrides.notification },
    frames: { ...base.frames, ...overrides.frames },
  });
}

function deepFreeze<T extends object>(value: T): T {
  for (const key of Object.keys(value)) {
    const nested: unknown = Reflect.get(value, key);
    if (nested && typeof nested === 'object' && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}
