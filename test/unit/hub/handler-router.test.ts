import { describe, it, expect, beforeEach, vi } from 'vitest';
import { HandlerRouter } from '../../../src/hub/handler-router.js';
import { EventBus } from '../../../src/core/events.js';
import type { HubEvents } from '../../../src/core/types.js';
import { MessageHandlerResults, type MessageHandlerResult } from '../../../src/hub/types.js';
import { StubHandler, makeConnection, makeMessage } from '../../helpers/hub-fixtures.js';

describe('HandlerRouter', () => {
  let bus: EventBus;
  let router: HandlerRouter<{ greeting: string }>;

  beforeEach(() => {
    bus = new EventBus();
    router = new HandlerRouter({ services: { greeting: 'hello' }, bus, handlerTimeoutMs: 50 });
  });

  describe('registration', () => {
    it('should create handlers lazily and only once', async () => {
      const handler = new StubHandler('Inventory');
      const factory = vi.fn(() => handler);
      router.registerHandler('Inventory', factory);

      expect(factory).not.toHaveBeenCalled();

      await router.routeMessage(makeMessage(), 'c1');
      await router.routeMessage(makeMessage({ messageId: 'msg-2' }), 'c1');

      expect(factory).toHaveBeenCalledTimes(1);
      expect(handler.handled).toHaveLength(2);
    });

    it('should pass the service locator to factories', () => {
      let seen = '';
      router.registerHandler('Inventory', services => {
        seen = services.get('greeting');
        return new StubHandler('Inventory');
      });

      router.supportedMessageTypes('Inventory');
      expect(seen).toBe('hello');
    });

    it('should replace an existing binding and drop the cached instance', async () => {
      const events: Array<HubEvents['handler:registered']> = [];
      bus.on('handler:registered', e => events.push(e));

      const first = new StubHandler('Inventory');
      const second = new StubHandler('Inventory');
      router.registerHandler('Inventory', () => first);
      await router.routeMessage(makeMessage(), 'c1');

      router.registerHandler('Inventory', () => second);
      await router.routeMessage(makeMessage(), 'c1');

      expect(first.handled).toHaveLength(1);
      expect(second.handled).toHaveLength(1);
      expect(events.map(e => e.replaced)).toEqual([false, true]);
      expect(router.registeredApps()).toEqual(['Inventory']);
    });

    it('should report supported types and registered apps', () => {
      router.registerHandler('Inventory', () => new StubHandler('Inventory', ['Ping', 'Adjust']));
      router.registerHandler('Billing', () => new StubHandler('Billing'));

      expect(router.registeredApps()).toEqual(['Inventory', 'Billing']);
      expect(router.isAppRegistered('Billing')).toBe(true);
      expect(router.isAppRegistered('Ghost')).toBe(false);
      expect(router.supportedMessageTypes('Inventory')).toEqual(['Ping', 'Adjust']);
      expect(router.supportedMessageTypes('Ghost')).toEqual([]);
    });
  });

  describe('routeMessage', () => {
    it('should return the handler result on success', async () => {
      const handler = new StubHandler('Inventory');
      handler.respond = async message => MessageHandlerResults.success({ echoed: message.data });
      router.registerHandler('Inventory', () => handler);

      const result = await router.routeMessage(makeMessage({ data: { qty: 2 } }), 'c9');

      expect(result).toEqual({
        success: true,
        responseData: { echoed: { qty: 2 } },
        shouldBroadcast: false,
        targetConnections: [],
      });
      expect(handler.handled[0]?.connectionId).toBe('c9');
    });

    it('should fail when no handler is bound', async () => {
      const result = await router.routeMessage(makeMessage({ targetApp: 'Ghost' }), 'c1');

      expect(result.success).toBe(false);
      expect(result.errorMessage).toBe('No handler for app: Ghost');
      expect(result.errorKind).toBe('validation');
    });

    it('should treat a throwing factory as a missing handler', async () => {
      router.registerHandler('Inventory', () => {
        throw new Error('misconfigured');
      });

      const result = await router.routeMessage(makeMessage(), 'c1');
      expect(result.errorMessage).toBe('No handler for app: Inventory');
    });

    it('should reject messages the handler does not validate', async () => {
      const handler = new StubHandler('Inventory');
      handler.valid = false;
      router.registerHandler('Inventory', () => handler);

      const result = await router.routeMessage(makeMessage(), 'c1');

      expect(result.errorMessage).toBe('Invalid message format for app: Inventory');
      expect(result.errorKind).toBe('validation');
      expect(handler.handled).toHaveLength(0);
    });

    it('should reject unsupported message types', async () => {
      const handler = new StubHandler('Inventory', ['Ping']);
      router.registerHandler('Inventory', () => handler);

      const result = await router.routeMessage(makeMessage({ messageType: 'Pong' }), 'c1');

      expect(result.errorMessage).toBe('Unsupported message type: Pong');
      expect(handler.handled).toHaveLength(0);
    });

    it('should convert a handler exception into an internal error', async () => {
      const handler = new StubHandler('Inventory');
      handler.respond = async () => {
        throw new Error('kaput');
      };
      router.registerHandler('Inventory', () => handler);

      const result = await router.routeMessage(makeMessage(), 'c1');

      expect(result).toMatchObject({
        success: false,
        errorMessage: 'Internal error: kaput',
        errorKind: 'handler',
        shouldBroadcast: false,
      });
    });

    it('should time out a handler that never settles', async () => {
      const handler = new StubHandler('Inventory');
      handler.respond = () => new Promise<MessageHandlerResult>(() => undefined);
      router.registerHandler('Inventory', () => handler);

      const result = await router.routeMessage(makeMessage(), 'c1');

      expect(result.errorKind).toBe('timeout');
      expect(result.errorMessage).toBe('Internal error: Handler for Inventory timed out in handleMessage after 50ms');
    });

    it('should publish a routed event for every message', async () => {
      const routed: Array<HubEvents['message:routed']> = [];
      bus.on('message:routed', e => routed.push(e));
      router.registerHandler('Inventory', () => new StubHandler('Inventory'));

      await router.routeMessage(makeMessage({ messageId: 'm-ok' }), 'c1');
      await router.routeMessage(makeMessage({ messageId: 'm-bad', targetApp: 'Ghost' }), 'c1');

      expect(routed.map(e => [e.messageId, e.success])).toEqual([['m-ok', true], ['m-bad', false]]);
    });
  });

  describe('lifecycle notifications', () => {
    it('should forward connect and disconnect to the handler', async () => {
      const handler = new StubHandler('Inventory');
      router.registerHandler('Inventory', () => handler);
      const connection = makeConnection({ connectionId: 'c1' });

      await router.notifyConnection('Inventory', connection, true);
      await router.notifyConnection('Inventory', connection, false);

      expect(handler.connected).toEqual([connection]);
      expect(handler.disconnected).toEqual([connection]);
    });

    it('should swallow handler failures during notification', async () => {
      const handler = new StubHandler('Inventory');
      handler.onAppConnected = async () => {
        throw new Error('not today');
      };
      router.registerHandler('Inventory', () => handler);

      await expect(router.notifyConnection('Inventory', makeConnection(), true)).resolves.toBeUndefined();
    });

    it('should ignore notifications for unbound apps', async () => {
      await expect(router.notifyConnection('Ghost', makeConnection(), true)).resolves.toBeUndefined();
    });

    it('should return initial data or null', async () => {
      const handler = new StubHandler('Inventory');
      handler.initialData = { items: 3 };
      router.registerHandler('Inventory', () => handler);

      expect(await router.getInitialData('Inventory', makeConnection())).toEqual({ items: 3 });
      expect(await router.getInitialData('Ghost', makeConnection())).toBeNull();
    });

    it('should return null when initial data fails', async () => {
      const handler = new StubHandler('Inventory');
      handler.getInitialData = async () => {
        throw new Error('db down');
      };
      router.registerHandler('Inventory', () => handler);

      expect(await router.getInitialData('Inventory', makeConnection())).toBeNull();
    });
  });
});
