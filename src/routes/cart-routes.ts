import { FastifyInstance } from 'fastify';
import { CartService } from '../cart/cart-service';
import { CheckoutService } from '../checkout/checkout-service';
import { childLogger } from '../observability/logger';
import { toCartResponse, toCheckoutResponse } from './serializers';

/** POST /cart/add */
interface AddToCartBody {
  session_id: string;
  item_id: string;
  quantity: number;
  special_requests?: string | null;
}

/** POST /cart/remove */
interface RemoveFromCartBody {
  session_id: string;
  item_id: string;
}

/** POST /cart/:session_id/checkout */
interface CheckoutBody {
  customer_name: string;
  customer_phone: string;
  special_instructions?: string;
}

interface SessionParams {
  session_id: string;
}

const addToCartSchema = {
  body: {
    type: 'object',
    required: ['session_id', 'item_id'],
    properties: {
      session_id: { type: 'string', minLength: 1 },
      item_id: { type: 'string', minLength: 1 },
      quantity: { type: 'integer', default: 1 },
      special_requests: { type: ['string', 'null'] },
    },
  },
};

const removeFromCartSchema = {
  body: {
    type: 'object',
    required: ['session_id', 'item_id'],
    properties: {
      session_id: { type: 'string', minLength: 1 },
      item_id: { type: 'string', minLength: 1 },
    },
  },
};

// Name and phone default to '' (and an absent body counts as {}) so a missing
// cart is reported before missing customer details
const checkoutSchema = {
  body: {
    type: 'object',
    properties: {
      customer_name: { type: 'string', default: '' },
      customer_phone: { type: 'string', default: '' },
      special_instructions: { type: 'string', default: '' },
    },
  },
};

/**
 * Register cart and checkout endpoints invoked as tools by the voice assistant.
 */
export function registerCartRoutes(
  app: FastifyInstance,
  cartService: CartService,
  checkoutService: CheckoutService,
): void {
  // ─────────────────────────────────────────────
  // POST /cart/add — add an item (or bump its quantity)
  // ─────────────────────────────────────────────
  app.post<{ Body: AddToCartBody }>('/cart/add', { schema: addToCartSchema }, async (req, reply) => {
    const { session_id, item_id, quantity, special_requests } = req.body;
    childLogger(req.id, { tool: 'addToCart' }).info({ sessionId: session_id, itemId: item_id, quantity }, 'Add to cart');

    const cart = await cartService.addItem(session_id, item_id, quantity, special_requests);
    const name = cart.items.find((i) => i.itemId === item_id)?.name ?? item_id;
    return reply.send({
      message: `Added ${quantity}x ${name} to cart`,
      cart: toCartResponse(cart),
    });
  });

  // ─────────────────────────────────────────────
  // GET /cart/:session_id — cart summary (empty cart if none)
  // ─────────────────────────────────────────────
  app.get<{ Params: SessionParams }>('/cart/:session_id', async (req, reply) => {
    const { session_id } = req.params;
    childLogger(req.id, { tool: 'getCart' }).info({ sessionId: session_id }, 'Get cart');
    const cart = await cartService.getCart(session_id);
    return reply.send(toCartResponse(cart));
  });

  // ─────────────────────────────────────────────
  // POST /cart/remove — remove a whole line
  // ─────────────────────────────────────────────
  app.post<{ Body: RemoveFromCartBody }>('/cart/remove', { schema: removeFromCartSchema }, async (req, reply) => {
    const { session_id, item_id } = req.body;
    childLogger(req.id, { tool: 'removeFromCart' }).info({ sessionId: session_id, itemId: item_id }, 'Remove from cart');

    const { removed, cart } = await cartService.removeItem(session_id, item_id);
    return reply.send({
      message: `Removed ${removed.name} from cart`,
      cart: toCartResponse(cart),
    });
  });

  // DELETE variant of /cart/remove
  app.delete<{ Params: SessionParams & { item_id: string } }>(
    '/cart/:session_id/item/:item_id',
    async (req, reply) => {
      const { session_id, item_id } = req.params;
      const { removed, cart } = await cartService.removeItem(session_id, item_id);
      return reply.send({
        message: `Removed ${removed.name} from cart`,
        cart: toCartResponse(cart),
      });
    },
  );

  // DELETE /cart/:session_id — start over
  app.delete<{ Params: SessionParams }>('/cart/:session_id', async (req, reply) => {
    await cartService.clearCart(req.params.session_id);
    return reply.send({ ok: true });
  });

  // ─────────────────────────────────────────────
  // POST /cart/:session_id/checkout — cart → order
  // ─────────────────────────────────────────────
  app.post<{ Params: SessionParams; Body: CheckoutBody }>(
    '/cart/:session_id/checkout',
    {
      schema: checkoutSchema,
      preValidation: async (req) => {
        if (req.body === undefined || req.body === null) {
          req.body = { customer_name: '', customer_phone: '' };
        }
      },
    },
    async (req, reply) => {
      const { session_id } = req.params;
      const { customer_name, customer_phone, special_instructions } = req.body;
      childLogger(req.id, { tool: 'checkoutCart' }).info({ sessionId: session_id }, 'Checkout');

      const result = await checkoutService.checkout(session_id, {
        customerName: customer_name,
        customerPhone: customer_phone,
        specialInstructions: special_instructions,
      });
      return reply.status(201).send(toCheckoutResponse(result));
    },
  );
}
