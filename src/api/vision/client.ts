import type { AxiosInstance } from 'axios';
import type { GatewayEndpoint } from '../../config/pipeline.js';
import type { ProductMatch } from '../../types/models.js';
import { createGatewayClient, postValidated } from '../gateway.js';
import {
  visionRequestSchema,
  visionResponseSchema,
  type VisionGateway,
  type VisionMatchRequest,
  type VisionRequest,
} from '../types.js';

export class VisionClient implements VisionGateway {
  private client: AxiosInstance;

  constructor(endpoint: GatewayEndpoint, client?: AxiosInstance) {
    this.client = client ?? createGatewayClient('vision', endpoint);
  }

  /**
   * Match the product on screen at a point in the stream
   * POST /match_product
   */
  async match(request: VisionMatchRequest): Promise<ProductMatch> {
    const body: VisionRequest = {
      streamer: request.streamer,
      timestamp: request.timestamp,
    };
    if (request.frameUrls && request.frameUrls.length > 0) {
      body.frame_urls = request.frameUrls;
    }

    const response = await postValidated(
      'vision',
      this.client,
      '/match_product',
      visionRequestSchema,
      visionResponseSchema,
      body
    );

    return {
      streamer: request.streamer,
      streamTimestamp: request.timestamp,
      productId: response?.productId ?? null,
      confidence: response?.productId ? response.score : 0,
    };
  }
}
