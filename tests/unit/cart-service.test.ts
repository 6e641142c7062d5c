import { CartService } from '../../src/cart/cart-service';
import { KeyValueCartStore } from '../../src/cart/cart-store';
import { InMemoryKeyValueStore } from '../../src/store/kv-store';
import {
  InvalidArgumentError,
  ItemNotFoundError,
  ItemNotInCartError,
  QuantityLimitExceededError,
} from '../../src/errors';
import { buildTestCatalog, createClock } from '../helpers/fixtures';

describe('CartService', () => {
  let clock: ReturnType<typeof createClock>;
  let kv: InMemoryKeyValueStore;
  let store: KeyValueCartStore;
  let service: CartService;

  beforeEach(() => {
    clock = createClock(0);
    kv = new InMemoryKeyValueStore(clock.now);
    store = new KeyValueCartStore(kv, 3600);
    service = new CartService(buildTestCatalog(), store, { maxTotalQuantity: 10, now: clock.now });
  });

  afterEach(async () => {
    await kv.close();
  });

  describe('addItem', () => {
    it('should merge repeated adds of the same item into one line', async () => {
      await service.addItem('call-1', 'main1', 2);
      const cart = await service.addItem('call-1', 'main1', 1);

      expect(cart.items).toHaveLength(1);
      expect(cart.items[0]).toEqual({
        itemId: 'main1',
        name: 'Carne Asada Plate',
        quantity: 3,
        unitPrice: 24.99,
        lineTotal: 74.97,
        specialRequests: null,
      });
      expect(cart.totalItems).toBe(3);
      expect(cart.totalAmount).toBe(74.97);
    });

    it('should never create duplicate lines across N single adds', async () => {
      for (let i = 0; i < 7; i++) {
        await service.addItem('call-1', 'main2');
      }
      const cart = await service.getCart('call-1');
      expect(cart.itemsInCart).toBe(1);
      expect(cart.items[0].quantity).toBe(7);
    });

    it('should total several lines in cents', async () => {
      await service.addItem('call-1', 'main1', 2);
      await service.addItem('call-1', 'app1', 1);
      const cart = await service.addItem('call-1', 'dessert1', 3);

      expect(cart.itemsInCart).toBe(3);
      expect(cart.totalItems).toBe(6);
      expect(cart.totalAmount).toBe(81.98);
    });

    it('should overwrite special requests with the latest value', async () => {
      await service.addItem('call-1', 'main1', 1, 'no onions');
      let cart = await service.addItem('call-1', 'main1', 1, '  extra salsa ');
      expect(cart.items[0].specialRequests).toBe('extra salsa');

      cart = await service.addItem('call-1', 'main1', 1);
      expect(cart.items[0].specialRequests).toBeNull();
    });

    it.each([0, -2, 1.5])('should reject quantity %p', async (quantity) => {
      await expect(service.addItem('call-1', 'main1', quantity)).rejects.toBeInstanceOf(InvalidArgumentError);
      expect(await store.get('call-1')).toBeNull();
    });

    it('should reject an unknown item without creating a cart', async () => {
      await expect(service.addItem('call-1', 'pizza9')).rejects.toBeInstanceOf(ItemNotFoundError);
      expect(await store.get('call-1')).toBeNull();
    });

    it('should reject a blank session id', async () => {
      await expect(service.addItem('   ', 'main1')).rejects.toBeInstanceOf(InvalidArgumentError);
    });

    it('should enforce the cart-wide quantity limit and leave the cart unchanged', async () => {
      await service.addItem('call-1', 'main1', 6);
      await expect(service.addItem('call-1', 'main2', 5)).rejects.toBeInstanceOf(QuantityLimitExceededError);

      const cart = await service.getCart('call-1');
      expect(cart.items.map((i) => [i.itemId, i.quantity])).toEqual([['main1', 6]]);

      const filled = await service.addItem('call-1', 'main2', 4);
      expect(filled.totalItems).toBe(10);
    });

    it('should refresh the cart expiry on every add', async () => {
      await service.addItem('call-1', 'main1');
      clock.advance(3_000_000);
      expect(await kv.ttl('cart:call-1')).toBe(600);

      await service.addItem('call-1', 'main1');
      expect(await kv.ttl('cart:call-1')).toBe(3600);
    });

    it('should use the session id as given without trimming it', async () => {
      await service.addItem('abc', 'main1', 1);
      const padded = await service.addItem(' abc ', 'main1', 1);

      expect(padded.sessionId).toBe(' abc ');
      expect(padded.totalItems).toBe(1);
      expect((await service.getCart('abc')).totalItems).toBe(1);
    });

    it('should keep carts of different sessions apart', async () => {
      await service.addItem('call-1', 'main1', 2);
      await service.addItem('call-2', 'dessert1', 1);

      expect((await service.getCart('call-1')).totalAmount).toBe(49.98);
      expect((await service.getCart('call-2')).totalAmount).toBe(7.5);
    });
  });

  describe('removeItem', () => {
    it('should remove the whole line regardless of quantity', async () => {
      await service.addItem('call-1', 'main1', 3);
      await service.addItem('call-1', 'app1', 1);

      const { removed, cart } = await service.removeItem('call-1', 'main1');
      expect(removed.quantity).toBe(3);
      expect(cart.items.map((i) => i.itemId)).toEqual(['app1']);
      expect(cart.totalAmount).toBe(9.5);
    });

    it('should fail for an item not in the cart and leave other lines alone', async () => {
      await service.addItem('call-1', 'main1', 2);
      await expect(service.removeItem('call-1', 'dessert1')).rejects.toBeInstanceOf(ItemNotInCartError);

      const cart = await service.getCart('call-1');
      expect(cart.items.map((i) => [i.itemId, i.quantity])).toEqual([['main1', 2]]);
    });

    it('should fail when the session has no cart', async () => {
      await expect(service.removeItem('call-404', 'main1')).rejects.toBeInstanceOf(ItemNotInCartError);
    });

    it('should delete the cart once its last line is removed', async () => {
      await service.addItem('call-1', 'main1');
      await service.removeItem('call-1', 'main1');
      expect(await kv.get('cart:call-1')).toBeNull();
    });
  });

  describe('getCart', () => {
    it('should return the canonical empty cart for an unknown session', async () => {
      expect(await service.getCart('call-new')).toEqual({
        sessionId: 'call-new',
        items: [],
        itemsInCart: 0,
        totalItems: 0,
        totalAmount: 0,
      });
    });

    it('should return an empty cart once the cart expires', async () => {
      await service.addItem('call-1', 'main1');
      clock.advance(3_600_000);
      expect((await service.getCart('call-1')).items).toEqual([]);
    });

    it('should price lines from the current menu', async () => {
      await service.addItem('call-1', 'main1', 2);
      const repriced = new CartService(buildTestCatalog({ main1: 20 }), store, { maxTotalQuantity: 10 });

      const cart = await repriced.getCart('call-1');
      expect(cart.items[0].unitPrice).toBe(20);
      expect(cart.totalAmount).toBe(40);
    });
  });

  describe('clearCart', () => {
    it('should drop the cart and tolerate repeated calls', async () => {
      await service.addItem('call-1', 'main1');
      await service.clearCart('call-1');
      await service.clearCart('call-1');
      expect((await service.getCart('call-1')).totalItems).toBe(0);
    });
  });
});
