import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { OrderService } from '../orders/order-service';
import { ORDER_STATUSES, OrderStatus } from '../orders/types';
import { childLogger } from '../observability/logger';
import { toOrderResponse } from './serializers';

interface OrderParams {
  order_id: string;
}

/** PATCH /orders/:order_id/status */
interface UpdateStatusBody {
  status: OrderStatus;
}

const updateStatusSchema = {
  body: {
    type: 'object',
    required: ['status'],
    properties: {
      status: { type: 'string', enum: ORDER_STATUSES },
    },
  },
};

export function registerOrderRoutes(app: FastifyInstance, orderService: OrderService, adminApiKey: string): void {
  const verifyAdmin = async (req: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | undefined> => {
    const key = req.headers['x-admin-api-key'];
    // No key configured means status updates are disabled
    if (!adminApiKey || key !== adminApiKey) {
      return reply.status(403).send({
        error: { code: 'FORBIDDEN', message: 'Forbidden', statusCode: 403 },
        timestamp: new Date().toISOString(),
      });
    }
    return undefined;
  };

  // GET /orders/:order_id — order detail
  app.get<{ Params: OrderParams }>('/orders/:order_id', async (req, reply) => {
    const { order_id } = req.params;
    childLogger(req.id, { tool: 'getOrder' }).info({ orderId: order_id }, 'Get order');
    const order = await orderService.getOrder(order_id);
    return reply.send(toOrderResponse(order));
  });

  // PATCH /orders/:order_id/status — kitchen/admin progression
  app.patch<{ Params: OrderParams; Body: UpdateStatusBody }>(
    '/orders/:order_id/status',
    { schema: updateStatusSchema, preValidation: verifyAdmin },
    async (req, reply) => {
      const { order } = await orderService.updateStatus(req.params.order_id, req.body.status);
      return reply.send(toOrderResponse(order));
    },
  );
}
