import { describe, it, expect, vi, afterEach } from 'vitest';
import { OptionNumbers, ResponseCodes } from '../../src/constants.js';
import { DeliveryEngine } from '../../src/core/engine.js';
import {
  DuplicateMidError,
  StateError,
  TransportReadError,
  TransportUnavailableError,
  TransportWriteError,
  ValidationError,
} from '../../src/core/errors.js';
import { Message, Request, Response } from '../../src/core/message.js';
import { MemoryTransport } from '../../src/testing/memory-transport.js';
import type { BlockLayer, EngineOptions } from '../../src/types/index.js';
import type { Logger } from '../../src/types/logger.js';
import { FAST, codec, decode, emptyReply, piggyback, sleep, waitFor } from '../helpers/coap.js';

interface Delivery {
  response: Response | null;
  request: Request;
}

const engines: DeliveryEngine[] = [];

function setup(options: EngineOptions = {}, transport = new MemoryTransport()) {
  const deliveries: Delivery[] = [];
  const engine = new DeliveryEngine(transport, {
    ...FAST,
    onResponse: (response, request) => deliveries.push({ response, request }),
    ...options,
  });
  engines.push(engine);
  return { engine, transport, deliveries };
}

afterEach(async () => {
  await Promise.all(engines.splice(0).map((engine) => engine.close()));
});

describe('DeliveryEngine', () => {
  describe('lifecycle', () => {
    it('should open the transport once', async () => {
      const { engine, transport } = setup();

      await Promise.all([engine.open(), engine.open()]);

      expect(engine.lifecycle).toBe('open');
      expect(transport.openCount).toBe(1);
    });

    it('should wrap open failures and stay idle', async () => {
      const transport = new MemoryTransport({ failOpen: new Error('no such device') });
      const { engine } = setup({}, transport);

      await expect(engine.open()).rejects.toBeInstanceOf(TransportUnavailableError);
      expect(engine.lifecycle).toBe('idle');
    });

    it('should refuse to send before open', async () => {
      const { engine } = setup();

      await expect(engine.send(new Request({ path: '/x' }))).rejects.toThrow(StateError);
      await expect(engine.send(new Request({ path: '/x' }))).rejects.toThrow('Engine is not open');
    });

    it('should return the same promise from a second close', async () => {
      const { engine, transport } = setup();
      await engine.open();

      const first = engine.close();
      const second = engine.close();
      expect(second).toBe(first);
      await first;

      expect(engine.lifecycle).toBe('closed');
      expect(transport.closeCount).toBe(1);
    });
  });

  describe('message IDs', () => {
    it('should start at the configured MID and wrap modulo 2^16', async () => {
      const { engine, transport } = setup({ startingMid: 65535 });
      await engine.open();

      await engine.send(new Request({ type: 'NON', path: '/a' }));
      await engine.send(new Request({ type: 'NON', path: '/b' }));

      expect(transport.sent.map((datagram) => decode(datagram).mid)).toEqual([65535, 0]);
      expect(engine.currentMid).toBe(1);
    });

    it('should validate currentMid', async () => {
      const { engine, transport } = setup({ startingMid: 0 });
      await engine.open();

      expect(() => {
        engine.currentMid = 70000;
      }).toThrow(ValidationError);
      expect(() => {
        engine.currentMid = 1.5;
      }).toThrow('Invalid MID: 1.5 (expected an integer in 0..65535)');

      engine.currentMid = 42;
      await engine.send(new Request({ type: 'NON', path: '/a' }));
      expect(decode(transport.sent[0]).mid).toBe(42);
    });

    it('should reject an invalid starting MID', () => {
      expect(() => new DeliveryEngine(new MemoryTransport(), { startingMid: -1 })).toThrow(ValidationError);
    });

    it('should reject a MID held by a live transaction', async () => {
      const { engine } = setup({ ackTimeout: 1000 });
      await engine.open();

      await engine.send(new Request({ mid: 10, path: '/a' }));
      await expect(engine.send(new Request({ mid: 10, path: '/b' }))).rejects.toBeInstanceOf(DuplicateMidError);
    });

    it('should skip MIDs held by live transactions', async () => {
      const { engine, transport } = setup({ ackTimeout: 1000, startingMid: 5 });
      await engine.open();

      await engine.send(new Request({ mid: 6, path: '/pinned' }));
      await engine.send(new Request({ path: '/a' }));
      await engine.send(new Request({ path: '/b' }));

      expect(transport.sent.map((datagram) => decode(datagram).mid)).toEqual([6, 5, 7]);
    });

    it('should assign a token to requests without one', async () => {
      const { engine, transport } = setup();
      await engine.open();

      await engine.send(new Request({ type: 'NON', path: '/a' }));

      expect(decode(transport.sent[0]).token.length).toBe(4);
    });
  });

  describe('retransmission', () => {
    it('should retransmit until acknowledged (two drops, ACK on the third send)', async () => {
      const transport = new MemoryTransport({
        handler: (datagram, index) => (index < 2 ? null : piggyback(datagram, { payload: 'ok' })),
      });
      const { engine, deliveries } = setup({ startingMid: 1 }, transport);
      await engine.open();

      const start = Date.now();
      const tx = await engine.send(new Request({ path: '/x' }));
      await waitFor(() => deliveries.length === 1);
      const elapsed = Date.now() - start;

      expect(transport.sent).toHaveLength(3);
      expect(transport.sent[1]).toEqual(transport.sent[0]);
      expect(transport.sent[2]).toEqual(transport.sent[0]);
      expect(decode(transport.sent[0]).mid).toBe(1);
      expect(tx?.retransmissions).toBe(2);
      expect(tx?.isRetransmitting).toBe(false);
      expect(deliveries[0].response?.text).toBe('ok');
      expect(deliveries[0].request.acknowledged).toBe(true);
      // backoff 20ms, then 40ms
      expect(elapsed).toBeGreaterThanOrEqual(55);
      expect(elapsed).toBeLessThan(1000);

      await sleep(100);
      expect(transport.sent).toHaveLength(3);
      expect(deliveries).toHaveLength(1);
      expect(engine.table.size).toBe(0);
      expect(engine.state.live.size).toBe(0);
    });

    it('should give up after exactly maxRetransmit retransmissions', async () => {
      const { engine, transport, deliveries } = setup({ startingMid: 7, ackTimeout: 10, maxRetransmit: 4 });
      await engine.open();

      const request = new Request({ path: '/silent' });
      await engine.send(request);
      await waitFor(() => deliveries.length === 1, 3000);

      expect(transport.sent).toHaveLength(5);
      expect(new Set(transport.sent.map((datagram) => datagram.toString('hex'))).size).toBe(1);
      expect(decode(transport.sent[0]).mid).toBe(7);
      expect(deliveries[0].response).toBeNull();
      expect(deliveries[0].request).toBe(request);
      expect(request.timedOut).toBe(true);
      expect(engine.table.size).toBe(0);

      await sleep(50);
      expect(deliveries).toHaveLength(1);
    });

    it('should never retransmit a NON request', async () => {
      const { engine, transport } = setup();
      await engine.open();

      const tx = await engine.send(new Request({ type: 'NON', path: '/a' }));
      await sleep(100);

      expect(tx?.isRetransmitting).toBe(false);
      expect(transport.sent).toHaveLength(1);
      expect(engine.state.live.size).toBe(0);
    });

    it('should ignore an ACK whose token does not match', async () => {
      const transport = new MemoryTransport({
        handler: (datagram) => {
          const request = decode(datagram);
          return codec.encode(
            new Response({ type: 'ACK', mid: request.mid, token: Buffer.from([0x99]), code: ResponseCodes.CONTENT })
          );
        },
      });
      const { engine, deliveries } = setup({ maxRetransmit: 0 }, transport);
      await engine.open();

      await engine.send(new Request({ path: '/x', token: Buffer.from([0x01]) }));
      await waitFor(() => deliveries.length === 1);

      expect(deliveries[0].response).toBeNull();
    });
  });

  describe('No-Response', () => {
    it('should send and return without starting the receiver', async () => {
      const { engine, transport } = setup();
      await engine.open();

      const request = new Request({ path: '/led', payload: 'on' });
      request.setOption(OptionNumbers.NO_RESPONSE, 26);
      const result = await engine.send(request);

      expect(result).toBeUndefined();
      expect(engine.receiving).toBe(false);
      expect(engine.table.size).toBe(0);
      expect(transport.sent).toHaveLength(1);

      await sleep(60);
      expect(transport.sent).toHaveLength(1);
    });

    it('should leave a running receiver alone', async () => {
      const { engine } = setup();
      await engine.open();

      await engine.send(new Request({ type: 'NON', path: '/a' }));
      expect(engine.receiving).toBe(true);

      const request = new Request({ path: '/led' });
      request.setOption(OptionNumbers.NO_RESPONSE, 26);
      await engine.send(request);

      expect(engine.receiving).toBe(true);
    });
  });

  describe('receiving', () => {
    it('should wait for a separate response after an empty ACK', async () => {
      const transport = new MemoryTransport({
        handler: (datagram, index) => (index === 0 ? emptyReply(datagram, 'ACK') : null),
      });
      const { engine, deliveries } = setup({}, transport);
      await engine.open();

      const request = new Request({ path: '/slow', token: Buffer.from([0x0a, 0x0b]) });
      const tx = await engine.send(request);
      await waitFor(() => request.acknowledged);
      await sleep(80);

      expect(transport.sent).toHaveLength(1);
      expect(tx?.isRetransmitting).toBe(false);
      expect(deliveries).toHaveLength(0);

      transport.inject(
        codec.encode(
          new Response({ type: 'CON', mid: 0x9000, token: Buffer.from([0x0a, 0x0b]), code: ResponseCodes.CONTENT, payload: 'late' })
        )
      );
      await waitFor(() => deliveries.length === 1);

      expect(deliveries[0].response?.text).toBe('late');
      await waitFor(() => transport.sent.length === 2);
      const ack = decode(transport.sent[1]);
      expect(ack.type).toBe('ACK');
      expect(ack.mid).toBe(0x9000);
      expect(ack.isEmpty).toBe(true);
      expect(engine.table.size).toBe(0);
    });

    it('should ACK a resent separate response without delivering it again', async () => {
      const transport = new MemoryTransport({
        handler: (datagram, index) => (index === 0 ? emptyReply(datagram, 'ACK') : null),
      });
      const { engine, deliveries } = setup({}, transport);
      await engine.open();

      const token = Buffer.from([0x0c, 0x0d]);
      const request = new Request({ path: '/slow', token });
      await engine.send(request);
      await waitFor(() => request.acknowledged);

      const separate = codec.encode(
        new Response({ type: 'CON', mid: 0x9001, token, code: ResponseCodes.CONTENT, payload: 'late' })
      );
      transport.inject(separate);
      await waitFor(() => deliveries.length === 1);

      transport.inject(separate);
      await waitFor(() => transport.sent.length === 3);
      await sleep(30);

      expect(deliveries).toHaveLength(1);
      const again = decode(transport.sent[2]);
      expect(again.type).toBe('ACK');
      expect(again.mid).toBe(0x9001);
      expect(again.isEmpty).toBe(true);
    });

    it('should report a RST without invoking the response callback', async () => {
      const transport = new MemoryTransport({ handler: (datagram) => emptyReply(datagram, 'RST') });
      const rejected: Request[] = [];
      const { engine, deliveries } = setup({ onReject: (request) => rejected.push(request) }, transport);
      await engine.open();

      const request = new Request({ path: '/x' });
      await engine.send(request);
      await waitFor(() => rejected.length === 1);
      await sleep(60);

      expect(rejected[0]).toBe(request);
      expect(request.rejected).toBe(true);
      expect(request.timedOut).toBe(false);
      expect(deliveries).toHaveLength(0);
      expect(engine.table.size).toBe(0);
      expect(transport.sent).toHaveLength(1);
    });

    it('should answer an unmatched confirmable response with RST', async () => {
      const { engine, transport } = setup();
      await engine.open();
      await engine.send(new Request({ type: 'NON', path: '/a' }));

      transport.inject(
        codec.encode(new Response({ type: 'CON', mid: 0x1111, token: Buffer.from([0xff]), code: ResponseCodes.CONTENT }))
      );
      await waitFor(() => transport.sent.length === 2);

      const reset = decode(transport.sent[1]);
      expect(reset.type).toBe('RST');
      expect(reset.mid).toBe(0x1111);
    });

    it('should answer a CoAP ping with RST', async () => {
      const { engine, transport } = setup();
      await engine.open();
      await engine.send(new Request({ type: 'NON', path: '/a' }));

      transport.inject(codec.encode(new Message({ type: 'CON', mid: 5 })));
      await waitFor(() => transport.sent.length === 2);

      expect(decode(transport.sent[1]).type).toBe('RST');
      expect(decode(transport.sent[1]).mid).toBe(5);
    });

    it('should discard malformed datagrams and keep going', async () => {
      const transport = new MemoryTransport({
        handler: (datagram) => [Buffer.from([0x00]), piggyback(datagram, { payload: 'fine' })],
      });
      const { engine, deliveries } = setup({}, transport);
      await engine.open();

      await engine.send(new Request({ path: '/x' }));
      await waitFor(() => deliveries.length === 1);

      expect(deliveries[0].response?.text).toBe('fine');
      expect(engine.lifecycle).toBe('open');
    });

    it('should log and survive a throwing callback', async () => {
      const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
      const transport = new MemoryTransport({ handler: (datagram) => piggyback(datagram) });
      const { engine } = setup(
        {
          logger,
          onResponse: () => {
            throw new Error('boom');
          },
        },
        transport
      );
      await engine.open();

      await engine.send(new Request({ path: '/x' }));
      await waitFor(() => vi.mocked(logger.error).mock.calls.length > 0);

      expect(logger.error).toHaveBeenCalledWith('Response callback threw: boom');
      expect(engine.lifecycle).toBe('open');
    });
  });

  describe('observe', () => {
    it('should keep the subscription and deliver every notification', async () => {
      const transport = new MemoryTransport({
        handler: (datagram, index) => (index === 0 ? piggyback(datagram, { payload: '20', observe: 5 }) : null),
      });
      const { engine, deliveries } = setup({}, transport);
      await engine.open();

      const token = Buffer.from([0x0b, 0x5e]);
      const request = new Request({ path: '/temp', token });
      request.observe = 0;
      await engine.send(request);
      await waitFor(() => deliveries.length === 1);

      const notification = new Response({ type: 'NON', mid: 0x2000, token, code: ResponseCodes.CONTENT, payload: '21' });
      notification.observe = 6;
      transport.inject(codec.encode(notification));
      await waitFor(() => deliveries.length === 2);

      expect(deliveries.map((d) => d.response?.text)).toEqual(['20', '21']);
      expect(engine.observeLayer.isObserving('0b5e')).toBe(true);
      expect(engine.table.lookupByToken(token)).toBeDefined();

      await engine.cancelObservation(request);

      expect(engine.observeLayer.isObserving('0b5e')).toBe(false);
      const deregister = decode(transport.sent[1]);
      expect(deregister).toBeInstanceOf(Request);
      expect(deregister.observe).toBe(1);
      expect(deregister.tokenHex).toBe('0b5e');
      if (deregister instanceof Request) {
        expect(deregister.path).toBe('/temp');
      }
    });

    it('should deliver a duplicated confirmable notification once', async () => {
      const transport = new MemoryTransport({
        handler: (datagram, index) => (index === 0 ? piggyback(datagram, { payload: '20', observe: 5 }) : null),
      });
      const { engine, deliveries } = setup({}, transport);
      await engine.open();

      const token = Buffer.from([0x0b, 0x5f]);
      const request = new Request({ path: '/temp', token });
      request.observe = 0;
      await engine.send(request);
      await waitFor(() => deliveries.length === 1);

      const notification = new Response({ type: 'CON', mid: 0x2001, token, code: ResponseCodes.CONTENT, payload: '21' });
      notification.observe = 6;
      const datagram = codec.encode(notification);
      transport.inject(datagram);
      await waitFor(() => deliveries.length === 2);
      transport.inject(datagram);
      await waitFor(() => transport.sent.length === 3);
      await sleep(30);

      expect(deliveries.map((d) => d.response?.text)).toEqual(['20', '21']);
      expect(decode(transport.sent[1]).type).toBe('ACK');
      expect(decode(transport.sent[2]).type).toBe('ACK');
      expect(decode(transport.sent[2]).mid).toBe(0x2001);
    });
  });

  describe('block collaborator', () => {
    it('should send the continuation with a fresh MID and deliver once', async () => {
      let rounds = 0;
      const blockLayer: BlockLayer = {
        sendRequest: (request) => request,
        receiveResponse: (transaction) => {
          rounds++;
          transaction.blockTransfer = rounds === 1;
          if (transaction.blockTransfer) {
            transaction.request = new Request({ path: '/big', token: transaction.request.token });
          }
        },
      };
      const transport = new MemoryTransport({
        handler: (datagram, index) => piggyback(datagram, { payload: `part${index}` }),
      });
      const { engine, deliveries } = setup({ blockLayer, startingMid: 100 }, transport);
      await engine.open();

      await engine.send(new Request({ path: '/big' }));
      await waitFor(() => deliveries.length === 1);
      await sleep(30);

      expect(deliveries).toHaveLength(1);
      expect(deliveries[0].response?.text).toBe('part1');
      expect(transport.sent.map((datagram) => decode(datagram).mid)).toEqual([100, 101]);
      expect(engine.table.size).toBe(0);
    });
  });

  describe('error policies', () => {
    it('should propagate write failures by default', async () => {
      const { engine, transport } = setup();
      await engine.open();
      transport.failWrites(1);

      await expect(engine.send(new Request({ path: '/x' }))).rejects.toBeInstanceOf(TransportWriteError);
      expect(engine.table.size).toBe(0);
    });

    it('should keep retransmitting when the write policy continues', async () => {
      const transport = new MemoryTransport({ handler: (datagram) => piggyback(datagram, { payload: 'ok' }) });
      const writePolicy = vi.fn(() => 'continue' as const);
      const { engine, deliveries } = setup({ writePolicy }, transport);
      await engine.open();
      transport.failWrites(1);

      const tx = await engine.send(new Request({ path: '/x' }));
      await waitFor(() => deliveries.length === 1);

      expect(writePolicy).toHaveBeenCalledWith(expect.any(TransportWriteError), engine);
      expect(transport.sent).toHaveLength(1);
      expect(tx?.retransmissions).toBe(1);
      expect(deliveries[0].response?.text).toBe('ok');
    });

    it('should stop the engine on a read failure by default', async () => {
      const { engine, transport } = setup();
      await engine.open();
      transport.failNextReceive();

      await engine.send(new Request({ type: 'NON', path: '/a' }));
      await waitFor(() => engine.lifecycle === 'stopped');

      await expect(engine.send(new Request({ type: 'NON', path: '/b' }))).rejects.toThrow(
        'Engine stopped after receive failure: Injected read failure'
      );
    });

    it('should keep receiving when the read policy continues', async () => {
      const transport = new MemoryTransport({ handler: (datagram) => piggyback(datagram, { payload: 'ok' }) });
      const readPolicy = vi.fn(() => 'continue' as const);
      const { engine, deliveries } = setup({ readPolicy }, transport);
      await engine.open();
      transport.failNextReceive();

      await engine.send(new Request({ path: '/x' }));
      await waitFor(() => deliveries.length === 1 && readPolicy.mock.calls.length === 1);

      expect(readPolicy).toHaveBeenCalledWith(expect.any(TransportReadError), engine);
      expect(engine.lifecycle).toBe('open');
    });
  });

  describe('close', () => {
    it('should end every retransmission in flight and report each as undelivered', async () => {
      const { engine, transport, deliveries } = setup({ ackTimeout: 1000 });
      await engine.open();

      await engine.send(new Request({ path: '/a' }));
      await engine.send(new Request({ path: '/b' }));
      await engine.send(new Request({ path: '/c' }));
      expect(engine.state.live.size).toBe(3);

      const start = Date.now();
      await engine.close();

      expect(Date.now() - start).toBeLessThan(500);
      expect(engine.state.live.size).toBe(0);
      expect(deliveries).toHaveLength(3);
      expect(deliveries.every((d) => d.response === null)).toBe(true);
      expect(engine.table.size).toBe(0);
      expect(transport.isOpen).toBe(false);
      expect(transport.sent).toHaveLength(3);
    });

    it('should refuse sends after close', async () => {
      const { engine } = setup();
      await engine.open();
      await engine.close();

      await expect(engine.send(new Request({ path: '/x' }))).rejects.toThrow(StateError);
    });
  });
});
