import type { AxiosInstance } from 'axios';
import type { GatewayEndpoint } from '../../config/pipeline.js';
import type { NotificationStatus } from '../../types/models.js';
import { createGatewayClient, postValidated } from '../gateway.js';
import {
  notificationRequestSchema,
  notificationResponseSchema,
  type NotificationGateway,
  type NotificationRequest,
  type SendNotificationRequest,
} from '../types.js';

const DELIVERED_STATUSES = new Set(['sent', 'queued', 'delivered']);

export class NotificationClient implements NotificationGateway {
  private client: AxiosInstance;

  constructor(endpoint: GatewayEndpoint, client?: AxiosInstance) {
    this.client = client ?? createGatewayClient('notification', endpoint);
  }

  /**
   * Send an order notification
   * POST /notify/{channel}
   */
  async send(request: SendNotificationRequest): Promise<NotificationStatus> {
    const body: NotificationRequest = {
      order_id: request.orderId,
      channel: request.channel,
      recipient: request.recipient,
      message: request.message,
    };

    const response = await postValidated(
      'notification',
      this.client,
      `/notify/${request.channel}`,
      notificationRequestSchema,
      notificationResponseSchema,
      body
    );

    if (!response) {
      return 'failed';
    }
    return DELIVERED_STATUSES.has(response.status) ? 'sent' : 'failed';
  }
}
