import axios, { AxiosError, AxiosInstance } from 'axios';
import type { ZodType, ZodTypeDef } from 'zod';
import type { GatewayEndpoint } from '../config/pipeline.js';
import { logger } from '../config/logger.js';
import {
  PermanentGatewayError,
  TransientGatewayError,
  type GatewayName,
} from '../errors.js';

/**
 * Axios instance for one stage service, with request/error logging.
 */
export function createGatewayClient(name: GatewayName, endpoint: GatewayEndpoint): AxiosInstance {
  const client = axios.create({
    baseURL: endpoint.baseUrl,
    headers: { 'Content-Type': 'application/json' },
    timeout: endpoint.timeoutMs,
  });

  client.interceptors.request.use((config) => {
    logger.debug(`${name} gateway request: ${config.method?.toUpperCase()} ${config.url}`);
    return config;
  });

  client.interceptors.response.use(
    (response) => response,
    (error: AxiosError) => {
      if (error.response) {
        logger.warn(`${name} gateway error`, {
          status: error.response.status,
          url: error.config?.url,
        });
      } else {
        logger.warn(`${name} gateway no response`, { url: error.config?.url, code: error.code });
      }
      throw error;
    }
  );

  return client;
}

/**
 * Map a failed call onto the pipeline's error taxonomy.
 *
 * - timeout, network failure, 5xx, 429 → transient (retried)
 * - 404 → null (the service has no answer for this input)
 * - any other 4xx → permanent (dead-lettered without retry)
 */
export function classifyGatewayError(
  name: GatewayName,
  error: unknown
): TransientGatewayError | PermanentGatewayError | null {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status === undefined) {
      return new TransientGatewayError(name, `${name} gateway unreachable: ${error.code ?? error.message}`);
    }
    if (status === 404) {
      return null;
    }
    if (status >= 500 || status === 429 || status === 408) {
      return new TransientGatewayError(name, `${name} gateway returned ${status}`, status);
    }
    return new PermanentGatewayError(name, `${name} gateway rejected request with ${status}`, status);
  }

  if (error instanceof TransientGatewayError || error instanceof PermanentGatewayError) {
    return error;
  }

  return new TransientGatewayError(name, `${name} gateway call failed: ${error instanceof Error ? error.message : String(error)}`);
}

/**
 * POST a validated body and validate the response.
 * Resolves null on 404; throws a classified gateway error otherwise.
 */
export async function postValidated<TReq, TRes>(
  name: GatewayName,
  client: AxiosInstance,
  path: string,
  requestSchema: ZodType<TReq, ZodTypeDef, unknown>,
  responseSchema: ZodType<TRes, ZodTypeDef, unknown>,
  body: unknown
): Promise<TRes | null> {
  const request = requestSchema.safeParse(body);
  if (!request.success) {
    throw new PermanentGatewayError(name, `Invalid ${name} request: ${request.error.issues[0]?.message ?? 'invalid'}`);
  }

  let data: unknown;
  try {
    const response = await client.post<unknown>(path, request.data);
    data = response.data;
  } catch (error) {
    const classified = classifyGatewayError(name, error);
    if (classified === null) {
      return null;
    }
    throw classified;
  }

  const parsed = responseSchema.safeParse(data);
  if (!parsed.success) {
    throw new PermanentGatewayError(name, `Malformed ${name} response: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }
  return parsed.data;
}
