import type { AxiosInstance } from 'axios';
import type { GatewayEndpoint } from '../../config/pipeline.js';
import { logger } from '../../config/logger.js';
import type { IntentResult } from '../../types/models.js';
import { createGatewayClient, postValidated } from '../gateway.js';
import { intentRequestSchema, intentResponseSchema, type IntentGateway } from '../types.js';

export class IntentClient implements IntentGateway {
  private client: AxiosInstance;

  constructor(endpoint: GatewayEndpoint, client?: AxiosInstance) {
    this.client = client ?? createGatewayClient('intent', endpoint);
  }

  /**
   * Classify a comment
   * POST /predict_intent
   */
  async classify(commentId: string, text: string): Promise<IntentResult> {
    const response = await postValidated(
      'intent',
      this.client,
      '/predict_intent',
      intentRequestSchema,
      intentResponseSchema,
      { text: text.slice(0, 2000) }
    );

    if (!response) {
      logger.info('Intent service had no classification', { commentId });
      return { commentId, label: 'none', confidence: 0 };
    }

    return { commentId, label: response.intent, confidence: response.score };
  }
}
