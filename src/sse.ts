import type { ServerResponse } from 'http';
import type { Writable } from 'stream';
import type { EventBus, Subscription } from './bus.js';
import { errorMessage } from './errors.js';
import { createLogger } from './logger.js';
import type { BusEvent } from './types.js';

const log = createLogger('sse');

export const PING_INTERVAL_MS = 15_000;

export function formatEvent(event: BusEvent): string {
  return `data: ${JSON.stringify(event)}\n\n`;
}

function waitForDrain(out: Writable, sub: Subscription): Promise<void> {
  return new Promise((resolve) => {
    let removeCloseHandler = () => {};
    const done = () => {
      out.off('drain', done);
      out.off('close', done);
      removeCloseHandler();
      resolve();
    };
    out.once('drain', done);
    out.once('close', done);
    removeCloseHandler = sub.onClose(done);
  });
}

/**
 * Copies events from the subscription to `out` until the subscription
 * closes. Honours backpressure: while the socket is full, events pile up in
 * the subscription's queue, and the bus drops it if that overflows.
 */
export async function pipeEvents(sub: Subscription, out: Writable): Promise<void> {
  for (let event = await sub.next(); event; event = await sub.next()) {
    if (out.destroyed || out.writableEnded) break;
    if (!out.write(formatEvent(event))) {
      await waitForDrain(out, sub);
    }
  }
  if (!out.writableEnded) out.end();
}

// Turns an HTTP response into a live event feed for one dashboard client
export function openEventStream(bus: EventBus, res: ServerResponse, pingMs = PING_INTERVAL_MS): Subscription {
  res.writeHead(200, {
    'Content-Type': 'text/event-stream',
    'Cache-Control': 'no-cache',
    Connection: 'keep-alive',
    'X-Accel-Buffering': 'no',
  });
  res.write(': connected\n\n');

  const sub = bus.subscribe();
  const ping = setInterval(() => {
    if (!res.writableEnded) res.write(': ping\n\n');
  }, pingMs);

  res.on('close', () => {
    clearInterval(ping);
    bus.unsubscribe(sub);
  });

  pipeEvents(sub, res).catch((err: unknown) => {
    log.warn(`Event stream ${sub.id} failed: ${errorMessage(err)}`);
    bus.unsubscribe(sub);
  });

  return sub;
}
