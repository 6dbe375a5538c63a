import type { AxiosInstance } from 'axios';
import type { GatewayEndpoint } from '../../config/pipeline.js';
import { PermanentGatewayError } from '../../errors.js';
import type { Order } from '../../types/models.js';
import { createGatewayClient, postValidated } from '../gateway.js';
import {
  orderRequestSchema,
  orderResponseSchema,
  type CreateOrderRequest,
  type OrderGateway,
  type OrderRequest,
} from '../types.js';

export class OrderClient implements OrderGateway {
  private client: AxiosInstance;

  constructor(endpoint: GatewayEndpoint, client?: AxiosInstance) {
    this.client = client ?? createGatewayClient('order', endpoint);
  }

  /**
   * Create an order. The service returns the existing order when it has
   * already seen the idempotency key.
   * POST /order/create
   */
  async create(request: CreateOrderRequest): Promise<Order> {
    const body: OrderRequest = {
      product_id: request.productId,
      buyer: request.buyer,
      streamer: request.streamer,
      source: request.source,
      quantity: request.quantity,
      idempotency_key: request.idempotencyKey,
    };

    const response = await postValidated(
      'order',
      this.client,
      '/order/create',
      orderRequestSchema,
      orderResponseSchema,
      body
    );

    if (!response) {
      throw new PermanentGatewayError('order', `Product ${request.productId} not found`, 404);
    }

    return {
      orderId: response.order_id,
      productId: request.productId,
      buyer: request.buyer,
      streamer: request.streamer,
      quantity: request.quantity,
      totalPrice: response.total_price,
      status: response.status,
    };
  }
}
